import crypto from 'crypto';

/**
 * Service for checking the shared API key callers present as a bearer value
 */
export class ApiKeyService {
  private readonly expectedDigest: Buffer;

  constructor(apiKey: string) {
    if (apiKey.length === 0) {
      throw new Error('API key must not be empty');
    }
    this.expectedDigest = ApiKeyService.digest(apiKey);
  }

  /**
   * Extracts the credentials from an `Authorization: Bearer <key>` header
   * @returns The bearer value, or null when the header is absent or uses another scheme
   */
  static parseBearer(header: string | undefined): string | null {
    if (!header) {
      return null;
    }
    const match = /^Bearer\s+(.+)$/i.exec(header.trim());
    return match ? match[1].trim() : null;
  }

  /**
   * Constant-time comparison of the presented key with the configured one
   */
  verify(header: string | undefined): boolean {
    const presented = ApiKeyService.parseBearer(header);
    if (presented === null) {
      return false;
    }
    return crypto.timingSafeEqual(ApiKeyService.digest(presented), this.expectedDigest);
  }

  // Hashing first gives both sides the same length
  private static digest(value: string): Buffer {
    return crypto.createHash('sha256').update(value).digest();
  }
}
