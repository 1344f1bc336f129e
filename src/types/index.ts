// Core data types used throughout the application

export const TASK_STATUSES = ['todo', 'in_progress', 'done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const SESSION_TYPES = ['study', 'review', 'lecture'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export interface Task {
  id: string;
  courseId: string;
  title: string;
  description: string | null;
  /** Calendar date (YYYY-MM-DD), or null when the due date is still TBD. */
  dueDate: string | null;
  assignedOn: string;
  status: TaskStatus;
  /** Share of the course grade, 0-100. */
  weightPercent: number;
  /** Grade obtained on the task, 0-100. */
  pointsEarned: number;
  totalWorkMinutes: number;
  completedAt: Date | null;
}

export interface StudySession {
  id: string;
  courseId: string;
  taskId: string | null;
  type: SessionType;
  startedAt: Date;
  endedAt: Date;
  durationMinutes: number;
}

export interface ActiveSession {
  id: string;
  courseId: string;
  taskId: string | null;
  type: SessionType;
  startedAt: Date;
}

export interface Course {
  id: string;
  name: string;
  tasks: Task[];
  sessions: StudySession[];
}

export interface Student {
  email: string;
  name: string;
  studentId: string;
  passwordHash: string;
  createdAt: Date;
  courses: Course[];
  activeSessions: ActiveSession[];
}

export interface DatabaseDocument {
  version: 1;
  currentStudent: string | null;
  students: Student[];
}

// Derived view over one calendar date; never persisted
export interface Day {
  date: string;
  tasksDue: Task[];
  tasksCompleted: Task[];
  sessions: StudySession[];
  studyMinutes: number;
}

export interface ScoreWeights {
  pointsPerStudyHour: number;
  completionWeight: number;
  pointsPerCompletedTask: number;
}

export interface Config {
  paths: {
    dataDir: string;
    database: string;
    logFile: string;
  };
  logging: {
    level: string;
    silent: boolean;
  };
  auth: {
    saltRounds: number;
  };
  analytics: ScoreWeights;
}
