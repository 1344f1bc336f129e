import dayjs from 'dayjs';
import type { ActiveSession, StudySession, Task } from '../types/index.js';
import type { StudentReport } from '../analytics/engine.js';
import { describeScore } from '../analytics/engine.js';
import { formatMinutes } from '../utils/dates.js';

const STATUS_LABELS: Record<Task['status'], string> = {
  todo: 'TODO',
  in_progress: 'IN PROGRESS',
  done: 'DONE',
};

function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function formatTask(task: Task): string {
  const due = task.dueDate ? dayjs(task.dueDate).format('MMM D, YYYY') : 'TBD';
  return `${task.courseId.padEnd(10)} ${task.id.padStart(3)}  ${STATUS_LABELS[task.status].padEnd(12)} ${due.padEnd(13)} ${task.title}`;
}

export function printTasks(tasks: Task[]): void {
  if (tasks.length === 0) {
    console.log('No tasks found.');
    return;
  }
  console.log(`${'Course'.padEnd(10)} ${'ID'.padStart(3)}  ${'Status'.padEnd(12)} ${'Due'.padEnd(13)} Title`);
  console.log('-'.repeat(60));
  for (const task of tasks) {
    console.log(formatTask(task));
  }
}

export function formatSession(session: StudySession): string {
  const start = dayjs(session.startedAt).format('MMM D HH:mm');
  const task = session.taskId ? ` (task ${session.taskId})` : '';
  return `${start}  ${session.courseId}  ${session.type}  ${formatMinutes(session.durationMinutes)}${task}`;
}

export function formatActive(active: ActiveSession, now: Date): string {
  const elapsed = Math.max(0, Math.floor((now.getTime() - active.startedAt.getTime()) / 60_000));
  const started = dayjs(active.startedAt).format('HH:mm:ss');
  return `${active.courseId}: ${active.type} since ${started} (${formatMinutes(elapsed)})`;
}

export function printReport(report: StudentReport): void {
  console.log(`\n=== Productivity Report: ${report.student.name} ===`);

  if (report.courses.length === 0) {
    console.log('No courses yet. Add one with "study-tracker course add <code>".');
  }
  for (const course of report.courses) {
    console.log(`\n${course.courseId} - ${course.name}`);
    console.log(`  Study time: ${formatMinutes(course.studyMinutes)} over ${course.sessionCount} sessions`);
    console.log(
      `  Tasks: ${course.tasksCompleted}/${course.tasksTotal} done (${percent(course.completionRate)})`
    );
    console.log(`  Productivity score: ${course.score}`);
    console.log(`  Weighted grade: ${course.grade}%`);
  }

  const { totals } = report;
  console.log('\n=== Totals ===');
  console.log(`Study time: ${formatMinutes(totals.studyMinutes)} over ${totals.sessionCount} sessions`);
  console.log(`Tasks: ${totals.tasksCompleted}/${totals.tasksTotal} done (${percent(totals.completionRate)})`);
  console.log(`Average course score: ${totals.averageScore}`);

  console.log(`\n=== ${dayjs(report.day.date).format('dddd, MMM D')} ===`);
  console.log(`Studied: ${formatMinutes(report.day.studyMinutes)}`);
  console.log(`Completed: ${report.day.tasksCompleted.length} tasks`);
  console.log(`Due: ${report.day.tasksDue.length} tasks`);
  console.log(`Daily productivity score: ${report.dailyScore} points`);
  console.log(describeScore(report.dailyScore));

  console.log('\n=== Up Next ===');
  const next = report.recommendation;
  if (!next) {
    console.log('No active tasks found! You are free.');
  } else {
    const days = next.daysLeft === null ? '?' : String(next.daysLeft);
    console.log(`${next.task.courseId}: ${next.task.title}`);
    console.log(
      `  Priority score: ${next.urgency.toFixed(1)} (weight ${next.task.weightPercent}% / days left ${days})`
    );
  }
  console.log('');
}
