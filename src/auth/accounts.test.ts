import { describe, it, expect, beforeEach } from 'vitest';
import type { DatabaseDocument } from '../types/index.js';
import { emptyDatabase } from '../storage/database.js';
import { authenticate, getCurrentStudent, logout, registerStudent, verifyPassword } from './accounts.js';

describe('accounts', () => {
  let db: DatabaseDocument;

  beforeEach(() => {
    db = emptyDatabase();
  });

  it('registers a student with a hashed password and logs them in', async () => {
    const student = await registerStudent(db, {
      email: 'Ada@Example.com',
      name: 'Ada',
      studentId: 'B00123',
      password: 'test-secret',
    });

    expect(student.email).toBe('ada@example.com');
    expect(student.passwordHash).not.toBe('test-secret');
    expect(await verifyPassword('test-secret', student.passwordHash)).toBe(true);
    expect(await verifyPassword('wrong-secret', student.passwordHash)).toBe(false);
    expect(db.currentStudent).toBe('ada@example.com');
    expect(getCurrentStudent(db)).toBe(student);
  });

  it('rejects a second account with the same email', async () => {
    await registerStudent(db, { email: 'ada@example.com', name: 'Ada', studentId: '1', password: 'test-secret' });

    await expect(
      registerStudent(db, { email: 'ADA@example.com', name: 'Ada L', studentId: '2', password: 'test-secret' })
    ).rejects.toMatchObject({ code: 'DUPLICATE' });
    expect(db.students).toHaveLength(1);
  });

  it('validates registration input', async () => {
    await expect(
      registerStudent(db, { email: 'ada@example.com', name: 'Ada', studentId: '1', password: 'short' })
    ).rejects.toMatchObject({ code: 'VALIDATION' });
    await expect(
      registerStudent(db, { email: 'not-an-email', name: 'Ada', studentId: '1', password: 'test-secret' })
    ).rejects.toMatchObject({ code: 'VALIDATION' });
    expect(db.students).toEqual([]);
  });

  it('authenticates with the right password only', async () => {
    await registerStudent(db, { email: 'ada@example.com', name: 'Ada', studentId: '1', password: 'test-secret' });
    logout(db);
    expect(getCurrentStudent(db)).toBeUndefined();

    await expect(authenticate(db, 'ada@example.com', 'wrong-secret')).rejects.toMatchObject({
      code: 'AUTH',
      message: 'Invalid email or password',
    });
    await expect(authenticate(db, 'bob@example.com', 'test-secret')).rejects.toMatchObject({ code: 'AUTH' });
    expect(db.currentStudent).toBeNull();

    const student = await authenticate(db, ' ADA@example.com ', 'test-secret');
    expect(student.name).toBe('Ada');
    expect(db.currentStudent).toBe('ada@example.com');
  });
});
