import { z } from 'zod';
import { SESSION_TYPES, TASK_STATUSES } from '../types/index.js';
import { isCalendarDate } from '../utils/dates.js';

const calendarDate = z.string().refine(isCalendarDate, 'expected a YYYY-MM-DD date');
const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));
const percent = z.number().min(0).max(100);

const TaskSchema = z.object({
  id: z.string().min(1),
  courseId: z.string().min(1),
  title: z.string().min(1),
  description: z.string().nullable(),
  dueDate: calendarDate.nullable(),
  assignedOn: calendarDate,
  status: z.enum(TASK_STATUSES),
  weightPercent: percent,
  pointsEarned: percent,
  totalWorkMinutes: z.number().min(0),
  completedAt: timestamp.nullable(),
}).refine(
  (t) => (t.status === 'done') === (t.completedAt !== null),
  'completedAt must be set exactly when the task is done'
);

const StudySessionSchema = z
  .object({
    id: z.string().min(1),
    courseId: z.string().min(1),
    taskId: z.string().nullable(),
    type: z.enum(SESSION_TYPES),
    startedAt: timestamp,
    endedAt: timestamp,
    durationMinutes: z.number().int().min(0),
  })
  .refine((s) => s.endedAt.getTime() >= s.startedAt.getTime(), 'session ends before it starts');

const ActiveSessionSchema = z.object({
  id: z.string().min(1),
  courseId: z.string().min(1),
  taskId: z.string().nullable(),
  type: z.enum(SESSION_TYPES),
  startedAt: timestamp,
});

const CourseSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    tasks: z.array(TaskSchema),
    sessions: z.array(StudySessionSchema),
  })
  .superRefine((course, ctx) => {
    const taskIds = course.tasks.map((t) => t.id);
    if (new Set(taskIds).size !== taskIds.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate task id in ${course.id}` });
    }
    for (const item of [...course.tasks, ...course.sessions]) {
      if (item.courseId !== course.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${item.id} is filed under ${course.id} but names ${item.courseId}`,
        });
      }
    }
  });

const StudentSchema = z
  .object({
    email: z.string().email(),
    name: z.string(),
    studentId: z.string(),
    passwordHash: z.string(),
    createdAt: timestamp,
    courses: z.array(CourseSchema),
    activeSessions: z.array(ActiveSessionSchema),
  })
  .superRefine((student, ctx) => {
    const ids = student.courses.map((c) => c.id);
    if (new Set(ids).size !== ids.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate course id for ${student.email}` });
    }
    const running = student.activeSessions.map((s) => s.courseId);
    if (new Set(running).size !== running.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `two timers on one course for ${student.email}` });
    }
    for (const active of student.activeSessions) {
      if (!ids.includes(active.courseId)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `timer for unknown course ${active.courseId}` });
      }
    }
  });

export const DatabaseSchema = z
  .object({
    version: z.literal(1),
    currentStudent: z.string().nullable(),
    students: z.array(StudentSchema),
  })
  .superRefine((db, ctx) => {
    const emails = db.students.map((s) => s.email);
    if (new Set(emails).size !== emails.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'duplicate student email' });
    }
  });
