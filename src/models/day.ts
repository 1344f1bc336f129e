import type { Day, Student } from '../types/index.js';
import { isCalendarDate, toDateKey } from '../utils/dates.js';
import { TrackerError } from '../utils/errors.js';
import { listTasks } from './student.js';

/**
 * Collect everything that happened on a calendar date (local time): tasks due,
 * tasks completed and sessions started that day.
 */
export function getDay(student: Student, date: string): Day {
  if (!isCalendarDate(date)) {
    throw new TrackerError(`Not a valid calendar date: ${date}`, 'VALIDATION');
  }

  const tasks = listTasks(student);
  const sessions = student.courses
    .flatMap((c) => c.sessions)
    .filter((s) => toDateKey(s.startedAt) === date)
    .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());

  return {
    date,
    tasksDue: tasks.filter((t) => t.dueDate === date),
    tasksCompleted: tasks.filter((t) => t.completedAt !== null && toDateKey(t.completedAt) === date),
    sessions,
    studyMinutes: sessions.reduce((sum, s) => sum + s.durationMinutes, 0),
  };
}
