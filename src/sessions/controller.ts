import { randomUUID } from 'crypto';
import type { ActiveSession, SessionType, Student, StudySession } from '../types/index.js';
import { SESSION_TYPES } from '../types/index.js';
import { requireCourse, requireTask, findTask } from '../models/student.js';
import { TrackerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface SessionHandle {
  sessionId: string;
  courseId: string;
}

export interface StartOptions {
  type?: SessionType;
  taskId?: string | null;
}

export function isSessionType(value: string): value is SessionType {
  return SESSION_TYPES.some((t) => t === value);
}

/**
 * Starts and stops study timers. Running timers live on the student record,
 * so a timer started by one command can be stopped by a later one. Each
 * course has at most one running timer.
 */
export class SessionController {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  getActive(student: Student, courseId: string): ActiveSession | undefined {
    const course = requireCourse(student, courseId);
    return student.activeSessions.find((s) => s.courseId === course.id);
  }

  listActive(student: Student): ActiveSession[] {
    return [...student.activeSessions];
  }

  start(student: Student, courseId: string, options: StartOptions = {}): SessionHandle {
    const course = requireCourse(student, courseId);

    if (student.activeSessions.some((s) => s.courseId === course.id)) {
      throw new TrackerError(`A study session is already running for ${course.id}`, 'TIMER_RUNNING');
    }

    const taskId = options.taskId ? requireTask(course, options.taskId).id : null;

    const active: ActiveSession = {
      id: randomUUID(),
      courseId: course.id,
      taskId,
      type: options.type ?? 'study',
      startedAt: this.clock(),
    };
    student.activeSessions.push(active);
    logger.info(`Started ${active.type} session for ${course.id}`);

    return { sessionId: active.id, courseId: course.id };
  }

  stop(student: Student, handle: SessionHandle): StudySession {
    const active = student.activeSessions.find(
      (s) => s.id === handle.sessionId && s.courseId === handle.courseId
    );
    if (!active) {
      throw new TrackerError(`No study session is running for ${handle.courseId}`, 'TIMER_NOT_RUNNING');
    }

    const endedAt = this.clock();
    const elapsedMs = endedAt.getTime() - active.startedAt.getTime();
    if (elapsedMs < 0) {
      throw new TrackerError('Session end time is before its start time', 'VALIDATION');
    }

    const course = requireCourse(student, active.courseId);
    const session: StudySession = {
      id: active.id,
      courseId: course.id,
      taskId: active.taskId,
      type: active.type,
      startedAt: active.startedAt,
      endedAt,
      durationMinutes: Math.floor(elapsedMs / 60_000),
    };

    course.sessions.push(session);
    if (session.taskId) {
      // The task may have been removed while the timer ran
      const task = findTask(course, session.taskId);
      if (task) task.totalWorkMinutes += session.durationMinutes;
    }
    student.activeSessions = student.activeSessions.filter((s) => s !== active);

    logger.info(`Recorded ${session.durationMinutes} minute session for ${course.id}`);
    return session;
  }
}
