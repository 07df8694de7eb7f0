import { describe, expect, it } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('verifies the original password against its hash', async () => {
    const hash = await hasher.hash('correct horse');

    expect(hash).not.toBe('correct horse');
    expect(await hasher.verify('correct horse', hash)).toBe(true);
  });

  it('rejects a wrong password', async () => {
    const hash = await hasher.hash('correct horse');
    expect(await hasher.verify('battery staple', hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const a = await hasher.hash('same-password');
    const b = await hasher.hash('same-password');
    expect(a).not.toBe(b);
  });

  it('returns false for a stored value that is not a bcrypt hash', async () => {
    expect(await hasher.verify('anything', 'not-a-hash')).toBe(false);
  });
});
