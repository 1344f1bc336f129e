import type { Course, Day, ScoreWeights, Student, Task } from '../types/index.js';
import { config } from '../utils/config.js';
import { daysUntil } from '../utils/dates.js';
import { getDay } from '../models/day.js';
import { isCompleted } from '../models/student.js';

export interface CourseSummary {
  courseId: string;
  name: string;
  studyMinutes: number;
  sessionCount: number;
  tasksTotal: number;
  tasksCompleted: number;
  completionRate: number;
  score: number;
  grade: number;
}

export interface TaskRecommendation {
  task: Task;
  urgency: number;
  /** null when the task has no due date */
  daysLeft: number | null;
}

export interface StudentReport {
  student: { email: string; name: string };
  courses: CourseSummary[];
  totals: {
    studyMinutes: number;
    sessionCount: number;
    tasksTotal: number;
    tasksCompleted: number;
    completionRate: number;
    averageScore: number;
  };
  day: Day;
  dailyScore: number;
  recommendation: TaskRecommendation | null;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function totalStudyMinutes(course: Course): number {
  return course.sessions.reduce((sum, s) => sum + s.durationMinutes, 0);
}

export function completionRate(course: Course): number {
  if (course.tasks.length === 0) return 0;
  return course.tasks.filter(isCompleted).length / course.tasks.length;
}

/**
 * Hours studied times pointsPerStudyHour, plus the completed share of tasks
 * times completionWeight.
 */
export function productivityScore(course: Course, weights: ScoreWeights = config.analytics): number {
  const hours = totalStudyMinutes(course) / 60;
  return round(hours * weights.pointsPerStudyHour + completionRate(course) * weights.completionWeight, 1);
}

export function dailyScore(day: Day, weights: ScoreWeights = config.analytics): number {
  const hours = day.studyMinutes / 60;
  return round(
    hours * weights.pointsPerStudyHour + day.tasksCompleted.length * weights.pointsPerCompletedTask,
    1
  );
}

export function describeScore(score: number): string {
  if (score > 100) return 'Amazing! You are crushing it today!';
  if (score > 50) return 'Good job! Keep up the work.';
  return 'Time to get to work! Finish a task to boost your score.';
}

/**
 * Weighted average of the grades earned, as a percentage.
 */
export function courseGrade(course: Course): number {
  const totalWeight = course.tasks.reduce((sum, t) => sum + t.weightPercent, 0);
  if (totalWeight === 0) return 0;

  const weightedSum = course.tasks
    .filter((t) => t.pointsEarned > 0)
    .reduce((sum, t) => sum + (t.pointsEarned / 100) * t.weightPercent, 0);
  return round((weightedSum / totalWeight) * 100, 2);
}

function urgencyOf(task: Task, today: Date): { urgency: number; daysLeft: number | null } {
  if (task.dueDate === null) {
    return { urgency: -1, daysLeft: null };
  }
  const daysLeft = daysUntil(task.dueDate, today);
  // Due today or overdue counts as a tenth of a day left
  return { urgency: task.weightPercent / Math.max(daysLeft, 0.1), daysLeft };
}

/**
 * Open tasks ordered most urgent first. Ties keep course and task order.
 */
export function rankTasksByUrgency(student: Student, today: Date): TaskRecommendation[] {
  return student.courses
    .flatMap((c) => c.tasks)
    .filter((t) => !isCompleted(t))
    .map((task) => ({ task, ...urgencyOf(task, today) }))
    .sort((a, b) => b.urgency - a.urgency);
}

export function recommendNextTask(student: Student, today: Date): TaskRecommendation | null {
  return rankTasksByUrgency(student, today)[0] ?? null;
}

export function summarizeCourse(course: Course, weights: ScoreWeights = config.analytics): CourseSummary {
  return {
    courseId: course.id,
    name: course.name,
    studyMinutes: totalStudyMinutes(course),
    sessionCount: course.sessions.length,
    tasksTotal: course.tasks.length,
    tasksCompleted: course.tasks.filter(isCompleted).length,
    completionRate: completionRate(course),
    score: productivityScore(course, weights),
    grade: courseGrade(course),
  };
}

export function buildReport(
  student: Student,
  date: string,
  today: Date,
  weights: ScoreWeights = config.analytics
): StudentReport {
  const courses = student.courses.map((c) => summarizeCourse(c, weights));
  const tasksTotal = courses.reduce((sum, c) => sum + c.tasksTotal, 0);
  const tasksCompleted = courses.reduce((sum, c) => sum + c.tasksCompleted, 0);
  const day = getDay(student, date);

  return {
    student: { email: student.email, name: student.name },
    courses,
    totals: {
      studyMinutes: courses.reduce((sum, c) => sum + c.studyMinutes, 0),
      sessionCount: courses.reduce((sum, c) => sum + c.sessionCount, 0),
      tasksTotal,
      tasksCompleted,
      completionRate: tasksTotal === 0 ? 0 : tasksCompleted / tasksTotal,
      averageScore:
        courses.length === 0 ? 0 : round(courses.reduce((sum, c) => sum + c.score, 0) / courses.length, 1),
    },
    day,
    dailyScore: dailyScore(day, weights),
    recommendation: recommendNextTask(student, today),
  };
}
