import { generateKeyPairSync } from 'crypto';

export interface TestKeyPair {
  privateKey: string;
  publicKey: string;
}

let cached: TestKeyPair | null = null;

/**
 * 2048-bit RSA pair generated once per test file
 */
export function getTestKeyPair(): TestKeyPair {
  if (!cached) {
    const { privateKey, publicKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    cached = { privateKey, publicKey };
  }
  return cached;
}

export const TEST_CLIENT_EMAIL = 'token-server@test-project.iam.gserviceaccount.com';
export const TEST_TOKEN_URI = 'https://oauth2.test.local/token';

export function serviceAccountKey(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'service_account',
    project_id: 'test-project',
    private_key_id: 'test-key-id',
    private_key: getTestKeyPair().privateKey,
    client_email: TEST_CLIENT_EMAIL,
    token_uri: TEST_TOKEN_URI,
    ...overrides,
  };
}
