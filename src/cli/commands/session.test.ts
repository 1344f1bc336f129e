import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

await vi.hoisted(async () => {
  const { mkdtempSync } = await import('fs');
  const { tmpdir } = await import('os');
  const { join } = await import('path');
  process.env.STUDY_TRACKER_DATA_DIR = mkdtempSync(join(tmpdir(), 'study-tracker-session-'));
});

import { createStudent, addCourse } from '../../models/student.js';
import { loadDatabase, saveDatabase } from '../../storage/database.js';
import { sessionCommand } from './session.js';

describe('session command', () => {
  beforeEach(() => {
    const student = createStudent({
      email: 'ada@example.com',
      name: 'Ada',
      studentId: 'B00123',
      passwordHash: 'not-a-real-hash',
    });
    addCourse(student, 'MATH1000', 'Calculus');
    saveDatabase({ version: 1, currentStudent: student.email, students: [student] });

    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts and stops a timer across invocations', async () => {
    await sessionCommand.parseAsync(['start', 'math1000'], { from: 'user' });
    expect(loadDatabase().students[0].activeSessions.map((s) => s.courseId)).toEqual(['MATH1000']);

    await sessionCommand.parseAsync(['stop', 'MATH1000'], { from: 'user' });
    const [student] = loadDatabase().students;
    expect(student.activeSessions).toEqual([]);
    expect(student.courses[0].sessions).toHaveLength(1);
    expect(student.courses[0].sessions[0].durationMinutes).toBe(0);
  });

  it('exits with an error when a timer is already running', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    await sessionCommand.parseAsync(['start', 'MATH1000'], { from: 'user' });

    await expect(sessionCommand.parseAsync(['start', 'MATH1000'], { from: 'user' })).rejects.toThrow(
      'process.exit(1)'
    );
    expect(error).toHaveBeenCalledWith('Error: A study session is already running for MATH1000');
    expect(loadDatabase().students[0].activeSessions).toHaveLength(1);
  });

  it('exits with an error when no timer is running', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(sessionCommand.parseAsync(['stop', 'MATH1000'], { from: 'user' })).rejects.toThrow(
      'process.exit(1)'
    );
    expect(error).toHaveBeenCalledWith('Error: No study session is running for MATH1000');
    expect(loadDatabase().students[0].courses[0].sessions).toEqual([]);
  });
});
