import { Command } from 'commander';
import dayjs from 'dayjs';
import { loadDatabase } from '../../storage/database.js';
import { getCurrentStudent } from '../../auth/accounts.js';
import { listTasks } from '../../models/student.js';
import { config } from '../../utils/config.js';
import { toDateKey } from '../../utils/dates.js';
import { formatActive } from '../render.js';

export const statusCommand = new Command('status')
  .description('Show account and tracking status')
  .option('--upcoming', 'List open tasks with a due date')
  .action((options: { upcoming?: boolean }) => {
    const db = loadDatabase();

    console.log('\n=== Account ===');
    console.log(`Data file: ${config.paths.database}`);
    console.log(`Registered students: ${db.students.length}`);
    const student = getCurrentStudent(db);
    if (!student) {
      console.log('Not logged in');
      console.log('');
      return;
    }
    console.log(`Logged in as: ${student.name} <${student.email}>`);

    const tasks = listTasks(student);
    const sessions = student.courses.flatMap((c) => c.sessions);
    console.log('\n=== Tracking ===');
    console.log(`Stats: ${student.courses.length} Courses | ${tasks.length} Tasks | ${sessions.length} Sessions`);

    const now = new Date();
    for (const active of student.activeSessions) {
      console.log(`Running: ${formatActive(active, now)}`);
    }

    const today = toDateKey(now);
    const upcoming = tasks
      .filter((t) => t.status !== 'done' && t.dueDate !== null)
      .sort((a, b) => (a.dueDate ?? '').localeCompare(b.dueDate ?? ''));
    console.log(`Open tasks with a due date: ${upcoming.length}`);

    if (options.upcoming && upcoming.length > 0) {
      console.log('\n=== Upcoming ===');
      for (const task of upcoming) {
        const due = dayjs(task.dueDate).format('MMM D, YYYY');
        const overdue = task.dueDate !== null && task.dueDate < today ? '[OVERDUE]' : '';
        console.log(`  ${overdue} ${due} - ${task.courseId}: ${task.title}`);
      }
    }

    console.log('');
  });
