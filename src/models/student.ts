import { z } from 'zod';
import type { Course, Student, Task, TaskStatus } from '../types/index.js';
import { TASK_STATUSES } from '../types/index.js';
import { TrackerError } from '../utils/errors.js';
import { parseDueDate, toDateKey } from '../utils/dates.js';

export interface NewStudent {
  email: string;
  name: string;
  studentId: string;
  passwordHash: string;
}

export interface NewTask {
  title: string;
  description?: string | null;
  /** Raw due date input, see parseDueDate */
  due?: string;
  weightPercent?: number;
}

const percentSchema = z.number().finite().min(0).max(100);

export function normalizeCourseId(id: string): string {
  return id.trim().replace(/\s+/g, ' ').toUpperCase();
}

export function createStudent(input: NewStudent, now: Date = new Date()): Student {
  return {
    email: input.email.trim().toLowerCase(),
    name: input.name.trim(),
    studentId: input.studentId.trim(),
    passwordHash: input.passwordHash,
    createdAt: now,
    courses: [],
    activeSessions: [],
  };
}

export function findCourse(student: Student, courseId: string): Course | undefined {
  const id = normalizeCourseId(courseId);
  return student.courses.find((c) => c.id === id);
}

export function requireCourse(student: Student, courseId: string): Course {
  const course = findCourse(student, courseId);
  if (!course) {
    throw new TrackerError(`Course not found: ${courseId}`, 'NOT_FOUND');
  }
  return course;
}

export function addCourse(student: Student, courseId: string, name?: string): Course {
  const id = normalizeCourseId(courseId);
  if (id === '') {
    throw new TrackerError('Course code cannot be empty', 'VALIDATION');
  }
  if (findCourse(student, id)) {
    throw new TrackerError(`Course ${id} already exists`, 'DUPLICATE');
  }

  const course: Course = {
    id,
    name: name?.trim() || id,
    tasks: [],
    sessions: [],
  };
  student.courses.push(course);
  return course;
}

export function removeCourse(student: Student, courseId: string): Course {
  const course = requireCourse(student, courseId);
  student.courses = student.courses.filter((c) => c !== course);
  // A running timer cannot outlive its course
  student.activeSessions = student.activeSessions.filter((s) => s.courseId !== course.id);
  return course;
}

export function findTask(course: Course, taskId: string): Task | undefined {
  return course.tasks.find((t) => t.id === taskId.trim());
}

export function requireTask(course: Course, taskId: string): Task {
  const task = findTask(course, taskId);
  if (!task) {
    throw new TrackerError(`Task ${taskId} not found in ${course.id}`, 'NOT_FOUND');
  }
  return task;
}

function nextTaskId(course: Course): string {
  const highest = course.tasks.reduce((max, t) => Math.max(max, Number(t.id) || 0), 0);
  return String(highest + 1);
}

function checkPercent(value: number, label: string): number {
  const result = percentSchema.safeParse(value);
  if (!result.success) {
    throw new TrackerError(`${label} must be a number between 0 and 100`, 'VALIDATION');
  }
  return result.data;
}

export function addTask(student: Student, courseId: string, input: NewTask, now: Date = new Date()): Task {
  const course = requireCourse(student, courseId);

  const title = input.title.trim();
  if (title === '') {
    throw new TrackerError('Task title cannot be empty', 'VALIDATION');
  }

  const task: Task = {
    id: nextTaskId(course),
    courseId: course.id,
    title,
    description: input.description?.trim() || null,
    dueDate: parseDueDate(input.due ?? '', now),
    assignedOn: toDateKey(now),
    status: 'todo',
    weightPercent: checkPercent(input.weightPercent ?? 0, 'Weight'),
    pointsEarned: 0,
    totalWorkMinutes: 0,
    completedAt: null,
  };
  course.tasks.push(task);
  return task;
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

export function updateTaskStatus(
  student: Student,
  courseId: string,
  taskId: string,
  status: string,
  now: Date = new Date()
): Task {
  if (!isTaskStatus(status)) {
    throw new TrackerError(
      `Unknown status "${status}" (expected one of ${TASK_STATUSES.join(', ')})`,
      'VALIDATION'
    );
  }
  const task = requireTask(requireCourse(student, courseId), taskId);

  if (status === 'done' && task.status !== 'done') {
    task.completedAt = now;
  } else if (status !== 'done') {
    task.completedAt = null;
  }
  task.status = status;
  return task;
}

export function completeTask(student: Student, courseId: string, taskId: string, now: Date = new Date()): Task {
  return updateTaskStatus(student, courseId, taskId, 'done', now);
}

export function recordTaskGrade(student: Student, courseId: string, taskId: string, points: number): Task {
  const task = requireTask(requireCourse(student, courseId), taskId);
  task.pointsEarned = checkPercent(points, 'Points earned');
  return task;
}

export function removeTask(student: Student, courseId: string, taskId: string): Task {
  const course = requireCourse(student, courseId);
  const task = requireTask(course, taskId);
  course.tasks = course.tasks.filter((t) => t !== task);
  return task;
}

export function listTasks(student: Student): Task[] {
  return student.courses.flatMap((c) => c.tasks);
}

export function isCompleted(task: Task): boolean {
  return task.status === 'done';
}
