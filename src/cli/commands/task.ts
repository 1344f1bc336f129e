import { Command } from 'commander';
import {
  addTask,
  completeTask,
  listTasks,
  recordTaskGrade,
  removeTask,
  requireCourse,
  updateTaskStatus,
} from '../../models/student.js';
import { printTasks } from '../render.js';
import { openWorkspace, parseNumber, persist, reportFailure } from '../workspace.js';

export const taskCommand = new Command('task').description('Manage course tasks');

taskCommand
  .command('add <course> <title>')
  .description('Add a task to a course')
  .option('-d, --due <date>', 'Due date (YYYY-MM-DD, "next friday", or TBD)', 'TBD')
  .option('-w, --weight <percent>', 'Share of the course grade (0-100)', '0')
  .option('--description <text>', 'Longer description')
  .action((course: string, title: string, options: { due: string; weight: string; description?: string }) => {
    try {
      const { db, student } = openWorkspace();
      const task = addTask(student, course, {
        title,
        description: options.description,
        due: options.due,
        weightPercent: parseNumber(options.weight, 'Weight'),
      });
      persist(db);
      console.log(`Task ${task.id} added to ${task.courseId} (due ${task.dueDate ?? 'TBD'}).`);
    } catch (error) {
      reportFailure('Adding task', error);
    }
  });

taskCommand
  .command('list [course]')
  .description('List tasks, optionally for one course')
  .option('--open', 'Hide completed tasks')
  .action((course: string | undefined, options: { open?: boolean }) => {
    try {
      const { student } = openWorkspace();
      const tasks = course ? requireCourse(student, course).tasks : listTasks(student);
      printTasks(options.open ? tasks.filter((t) => t.status !== 'done') : tasks);
    } catch (error) {
      reportFailure('Listing tasks', error);
    }
  });

taskCommand
  .command('status <course> <task> <status>')
  .description('Set task status (todo, in_progress, done)')
  .action((course: string, taskId: string, status: string) => {
    try {
      const { db, student } = openWorkspace();
      const task = updateTaskStatus(student, course, taskId, status);
      persist(db);
      console.log(`Status updated: ${task.title} is now ${task.status}.`);
    } catch (error) {
      reportFailure('Updating task', error);
    }
  });

taskCommand
  .command('done <course> <task>')
  .description('Mark a task as completed')
  .action((course: string, taskId: string) => {
    try {
      const { db, student } = openWorkspace();
      const task = completeTask(student, course, taskId);
      persist(db);
      console.log(`Completed: ${task.title}`);
    } catch (error) {
      reportFailure('Completing task', error);
    }
  });

taskCommand
  .command('grade <course> <task> <points>')
  .description('Record the grade earned on a task (0-100)')
  .action((course: string, taskId: string, points: string) => {
    try {
      const { db, student } = openWorkspace();
      const task = recordTaskGrade(student, course, taskId, parseNumber(points, 'Points'));
      persist(db);
      console.log(`Recorded ${task.pointsEarned}/100 for ${task.title}.`);
    } catch (error) {
      reportFailure('Recording grade', error);
    }
  });

taskCommand
  .command('remove <course> <task>')
  .description('Delete a task')
  .action((course: string, taskId: string) => {
    try {
      const { db, student } = openWorkspace();
      const task = removeTask(student, course, taskId);
      persist(db);
      console.log(`Removed task ${task.id}: ${task.title}`);
    } catch (error) {
      reportFailure('Removing task', error);
    }
  });
