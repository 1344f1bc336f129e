import bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { DatabaseDocument, Student } from '../types/index.js';
import { createStudent } from '../models/student.js';
import { config } from '../utils/config.js';
import { TrackerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  name: z.string().trim().min(1),
  studentId: z.string().trim().min(1),
  password: z.string().min(8),
});

export type RegisterInput = z.input<typeof registerSchema>;

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.saltRounds);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

export function findStudent(db: DatabaseDocument, email: string): Student | undefined {
  const key = email.trim().toLowerCase();
  return db.students.find((s) => s.email === key);
}

export async function registerStudent(
  db: DatabaseDocument,
  input: RegisterInput,
  now: Date = new Date()
): Promise<Student> {
  const parsed = registerSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TrackerError(`Invalid ${issue.path.join('.')}: ${issue.message}`, 'VALIDATION');
  }

  const { email, name, studentId, password } = parsed.data;
  if (findStudent(db, email)) {
    throw new TrackerError(`A student with email ${email} already exists`, 'DUPLICATE');
  }

  const student = createStudent({ email, name, studentId, passwordHash: await hashPassword(password) }, now);
  db.students.push(student);
  db.currentStudent = student.email;
  logger.info(`Registered student ${student.email}`);
  return student;
}

export async function authenticate(db: DatabaseDocument, email: string, password: string): Promise<Student> {
  const student = findStudent(db, email);
  if (!student || !(await verifyPassword(password, student.passwordHash))) {
    throw new TrackerError('Invalid email or password', 'AUTH');
  }
  db.currentStudent = student.email;
  logger.info(`Logged in as ${student.email}`);
  return student;
}

export function logout(db: DatabaseDocument): void {
  db.currentStudent = null;
}

export function getCurrentStudent(db: DatabaseDocument): Student | undefined {
  return db.currentStudent === null ? undefined : findStudent(db, db.currentStudent);
}
