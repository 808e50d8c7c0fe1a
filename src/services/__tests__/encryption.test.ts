import assert from 'node:assert/strict';
import { KeyMismatchError } from '../../shared/errors.js';
import { createCredentialCipher } from '../encryption.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

await test('decrypts what it encrypted', () => {
  const cipher = createCredentialCipher('test-secret');
  const sealed = cipher.encrypt('refresh-token-value');

  assert.notEqual(sealed, 'refresh-token-value');
  assert.equal(sealed.split('.').length, 5);
  assert.ok(sealed.startsWith('v1.'));
  assert.equal(cipher.decrypt(sealed), 'refresh-token-value');
});

await test('uses a fresh nonce for every encryption', () => {
  const cipher = createCredentialCipher('test-secret');
  assert.notEqual(cipher.encrypt('same'), cipher.encrypt('same'));
});

await test('a ciphertext from another key is a key mismatch', () => {
  const sealed = createCredentialCipher('old-test-secret').encrypt('refresh-token-value');
  assert.throws(() => createCredentialCipher('test-secret').decrypt(sealed), KeyMismatchError);
});

await test('a tampered payload fails authentication', () => {
  const cipher = createCredentialCipher('test-secret');
  const parts = cipher.encrypt('refresh-token-value').split('.');
  parts[4] = Buffer.from('something else', 'utf8').toString('base64url');
  assert.throws(() => cipher.decrypt(parts.join('.')), KeyMismatchError);
});

await test('an unknown envelope format is rejected', () => {
  const cipher = createCredentialCipher('test-secret');
  assert.throws(() => cipher.decrypt('plain-refresh-token'), /unknown format/);
});

await test('an empty secret is refused', () => {
  assert.throws(() => createCredentialCipher(''), /secret is empty/);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
