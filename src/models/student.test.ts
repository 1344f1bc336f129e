import { describe, it, expect, beforeEach } from 'vitest';
import type { Student } from '../types/index.js';
import { isTrackerError } from '../utils/errors.js';
import {
  addCourse,
  addTask,
  completeTask,
  createStudent,
  findCourse,
  listTasks,
  recordTaskGrade,
  removeCourse,
  removeTask,
  updateTaskStatus,
} from './student.js';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isTrackerError(error) ? error.code : 'unexpected';
  }
  return undefined;
}

const now = new Date(2025, 0, 15, 9, 0, 0);

describe('student model', () => {
  let student: Student;

  beforeEach(() => {
    student = createStudent(
      { email: ' Ada@Example.com ', name: 'Ada', studentId: 'B00123', passwordHash: 'hash' },
      now
    );
  });

  it('creates an empty student with a normalized email', () => {
    expect(student).toEqual({
      email: 'ada@example.com',
      name: 'Ada',
      studentId: 'B00123',
      passwordHash: 'hash',
      createdAt: now,
      courses: [],
      activeSessions: [],
    });
  });

  describe('courses', () => {
    it('normalizes course codes', () => {
      const course = addCourse(student, ' csci  2110 ');
      expect(course.id).toBe('CSCI 2110');
      expect(course.name).toBe('CSCI 2110');
      expect(findCourse(student, 'Csci 2110')).toBe(course);
    });

    it('rejects duplicate codes regardless of case', () => {
      addCourse(student, 'MATH1000', 'Calculus');
      expect(errorCode(() => addCourse(student, 'math1000'))).toBe('DUPLICATE');
      expect(student.courses).toHaveLength(1);
    });

    it('rejects an empty code', () => {
      expect(errorCode(() => addCourse(student, '   '))).toBe('VALIDATION');
    });

    it('removes a course together with its running timer', () => {
      addCourse(student, 'MATH1000');
      addCourse(student, 'PHYS1100');
      student.activeSessions.push({
        id: 's1',
        courseId: 'MATH1000',
        taskId: null,
        type: 'study',
        startedAt: now,
      });

      removeCourse(student, 'math1000');

      expect(student.courses.map((c) => c.id)).toEqual(['PHYS1100']);
      expect(student.activeSessions).toEqual([]);
    });

    it('fails to remove an unknown course', () => {
      expect(errorCode(() => removeCourse(student, 'NOPE'))).toBe('NOT_FOUND');
    });
  });

  describe('tasks', () => {
    beforeEach(() => {
      addCourse(student, 'MATH1000');
    });

    it('adds tasks with sequential ids', () => {
      const first = addTask(student, 'MATH1000', { title: 'Problem set 1', due: '2025-01-20', weightPercent: 10 }, now);
      const second = addTask(student, 'MATH1000', { title: 'Midterm' }, now);

      expect(first).toEqual({
        id: '1',
        courseId: 'MATH1000',
        title: 'Problem set 1',
        description: null,
        dueDate: '2025-01-20',
        assignedOn: '2025-01-15',
        status: 'todo',
        weightPercent: 10,
        pointsEarned: 0,
        totalWorkMinutes: 0,
        completedAt: null,
      });
      expect(second.id).toBe('2');
      expect(second.dueDate).toBeNull();
    });

    it('does not reuse the id of a removed task while a higher one exists', () => {
      addTask(student, 'MATH1000', { title: 'A' }, now);
      addTask(student, 'MATH1000', { title: 'B' }, now);
      removeTask(student, 'MATH1000', '1');

      expect(addTask(student, 'MATH1000', { title: 'C' }, now).id).toBe('3');
    });

    it('leaves the course untouched when input is invalid', () => {
      expect(errorCode(() => addTask(student, 'MATH1000', { title: 'Essay', weightPercent: 150 }, now))).toBe(
        'VALIDATION'
      );
      expect(errorCode(() => addTask(student, 'MATH1000', { title: '  ' }, now))).toBe('VALIDATION');
      expect(errorCode(() => addTask(student, 'MATH1000', { title: 'Essay', due: 'xyzzy' }, now))).toBe(
        'VALIDATION'
      );
      expect(errorCode(() => addTask(student, 'BIO', { title: 'Lab' }, now))).toBe('NOT_FOUND');
      expect(listTasks(student)).toEqual([]);
    });

    it('tracks completion time through status changes', () => {
      addTask(student, 'MATH1000', { title: 'Quiz' }, now);
      const later = new Date(2025, 0, 16, 14, 0, 0);

      const done = completeTask(student, 'MATH1000', '1', later);
      expect(done.status).toBe('done');
      expect(done.completedAt).toEqual(later);

      updateTaskStatus(student, 'MATH1000', '1', 'done', new Date(2025, 0, 17));
      expect(done.completedAt).toEqual(later);

      updateTaskStatus(student, 'MATH1000', '1', 'in_progress', later);
      expect(done.status).toBe('in_progress');
      expect(done.completedAt).toBeNull();
    });

    it('rejects unknown statuses and tasks', () => {
      addTask(student, 'MATH1000', { title: 'Quiz' }, now);
      expect(errorCode(() => updateTaskStatus(student, 'MATH1000', '1', 'finished'))).toBe('VALIDATION');
      expect(errorCode(() => updateTaskStatus(student, 'MATH1000', '9', 'done'))).toBe('NOT_FOUND');
    });

    it('records grades between 0 and 100', () => {
      addTask(student, 'MATH1000', { title: 'Quiz', weightPercent: 5 }, now);
      expect(recordTaskGrade(student, 'MATH1000', '1', 87.5).pointsEarned).toBe(87.5);
      expect(errorCode(() => recordTaskGrade(student, 'MATH1000', '1', -1))).toBe('VALIDATION');
    });
  });
});
