import {
  defaultPasswordFor,
  hashPassword,
  usernameFor,
  validatePassword,
  verifyPassword,
} from './password';

describe('validatePassword', () => {
  it('accepts strong passwords', () => {
    expect(validatePassword('Passw0rd1')).toBe(true);
  });

  it('rejects short passwords', () => {
    expect(validatePassword('Pw0rd')).toBe(false);
  });

  it('rejects passwords without numbers', () => {
    expect(validatePassword('Password')).toBe(false);
  });
});

describe('hashPassword', () => {
  it('never stores the clear text and verifies the same password', () => {
    const hash = hashPassword('test-secret-1');

    expect(hash).not.toContain('test-secret-1');
    expect(verifyPassword('test-secret-1', hash)).toBe(true);
    expect(verifyPassword('test-secret-2', hash)).toBe(false);
  });

  it('rejects malformed hashes', () => {
    expect(verifyPassword('anything', 'not-a-hash')).toBe(false);
  });
});

describe('employee logins', () => {
  it('derives the username from the name', () => {
    expect(usernameFor('Ravi  Kumar')).toBe('ravikumar');
  });

  it('builds the default password from the first three letters', () => {
    expect(defaultPasswordFor('Ravi Kumar')).toBe('rav123');
    expect(defaultPasswordFor('Al')).toBe('alx123');
  });
});
