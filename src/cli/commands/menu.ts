import { Command } from 'commander';
import inquirer from 'inquirer';
import dayjs from 'dayjs';
import type { DatabaseDocument, Student, TaskStatus } from '../../types/index.js';
import { loadDatabase } from '../../storage/database.js';
import { authenticate, getCurrentStudent, logout, registerStudent } from '../../auth/accounts.js';
import { addCourse, addTask, listTasks, requireCourse, updateTaskStatus } from '../../models/student.js';
import { SessionController } from '../../sessions/controller.js';
import { buildReport } from '../../analytics/engine.js';
import { isTrackerError } from '../../utils/errors.js';
import { formatMinutes, toDateKey } from '../../utils/dates.js';
import { logger } from '../../utils/logger.js';
import { formatTask, printReport, printTasks } from '../render.js';
import { parseNumber, persist } from '../workspace.js';

type MenuAction = 'session' | 'task' | 'status' | 'course' | 'report' | 'logout' | 'exit';

async function pause(): Promise<void> {
  await inquirer.prompt([{ type: 'input', name: 'continue', message: 'Press Enter to continue...' }]);
}

async function chooseCourse(student: Student): Promise<string> {
  const { courseId } = await inquirer.prompt<{ courseId: string }>([
    {
      type: 'list',
      name: 'courseId',
      message: 'Course:',
      choices: student.courses.map((c) => ({ name: `${c.id} - ${c.name}`, value: c.id })),
    },
  ]);
  return courseId;
}

async function signIn(db: DatabaseDocument): Promise<Student | null> {
  for (;;) {
    const { choice } = await inquirer.prompt<{ choice: 'login' | 'register' | 'exit' }>([
      {
        type: 'list',
        name: 'choice',
        message: 'Welcome to the Student Productivity Analytics Platform!',
        choices: [
          { name: 'Login', value: 'login' },
          { name: 'Create New Account', value: 'register' },
          { name: 'Exit', value: 'exit' },
        ],
      },
    ]);

    try {
      if (choice === 'exit') return null;

      if (choice === 'login') {
        const answers = await inquirer.prompt<{ email: string; password: string }>([
          { type: 'input', name: 'email', message: 'Email:' },
          { type: 'password', name: 'password', message: 'Password:', mask: '*' },
        ]);
        const student = await authenticate(db, answers.email, answers.password);
        persist(db);
        console.log(`\nLogin successful! Welcome back, ${student.name}.`);
        return student;
      }

      const answers = await inquirer.prompt<{ email: string; name: string; studentId: string; password: string }>([
        { type: 'input', name: 'email', message: 'Email:' },
        { type: 'input', name: 'name', message: 'Name:' },
        { type: 'input', name: 'studentId', message: 'Student ID:' },
        { type: 'password', name: 'password', message: 'Password (8+ characters):', mask: '*' },
      ]);
      const student = await registerStudent(db, answers);
      persist(db);
      console.log('\nAccount created successfully! Logging you in...');
      return student;
    } catch (error) {
      if (!isTrackerError(error)) throw error;
      console.error(`\nError: ${error.message}`);
    }
  }
}

async function runStudySession(db: DatabaseDocument, student: Student): Promise<void> {
  const courseId = await chooseCourse(student);
  const course = requireCourse(student, courseId);
  const open = course.tasks.filter((t) => t.status !== 'done');

  const { taskId } = await inquirer.prompt<{ taskId: string }>([
    {
      type: 'list',
      name: 'taskId',
      message: 'Working on:',
      choices: [
        { name: 'No specific task', value: '' },
        ...open.map((t) => ({ name: `${t.id}. ${t.title}`, value: t.id })),
      ],
      when: () => open.length > 0,
    },
  ]);

  const controller = new SessionController();
  const handle = controller.start(student, courseId, { taskId: taskId || null });
  persist(db);
  console.log(`Timer started at ${dayjs().format('HH:mm:ss')}! Good luck studying!`);

  await inquirer.prompt([{ type: 'input', name: 'stop', message: 'Press Enter to STOP the study session...' }]);

  const session = controller.stop(student, handle);
  persist(db);
  console.log(`\nStudy session saved! You studied for ${formatMinutes(session.durationMinutes)}.`);
}

async function createTask(db: DatabaseDocument, student: Student): Promise<void> {
  const courseId = await chooseCourse(student);
  const answers = await inquirer.prompt<{ title: string; due: string; weight: string }>([
    { type: 'input', name: 'title', message: 'Task title:' },
    { type: 'input', name: 'due', message: 'Due date (YYYY-MM-DD, "next friday", blank for none):' },
    { type: 'input', name: 'weight', message: 'Weight in course grade (%):', default: '0' },
  ]);

  const task = addTask(student, courseId, {
    title: answers.title,
    due: answers.due,
    weightPercent: parseNumber(answers.weight, 'Weight'),
  });
  persist(db);
  console.log(`Task added successfully! (${formatTask(task).trim()})`);
}

async function changeTaskStatus(db: DatabaseDocument, student: Student): Promise<void> {
  const tasks = listTasks(student);
  if (tasks.length === 0) {
    console.log('No tasks found.');
    return;
  }
  printTasks(tasks);

  const answers = await inquirer.prompt<{ key: string; status: TaskStatus }>([
    {
      type: 'list',
      name: 'key',
      message: 'Task to update:',
      choices: tasks.map((t) => ({ name: `${t.courseId} ${t.id}. ${t.title}`, value: `${t.courseId}\n${t.id}` })),
    },
    {
      type: 'list',
      name: 'status',
      message: 'New status:',
      choices: [
        { name: 'TODO', value: 'todo' },
        { name: 'IN PROGRESS', value: 'in_progress' },
        { name: 'DONE (earns completion points!)', value: 'done' },
      ],
    },
  ]);

  const [courseId, taskId] = answers.key.split('\n');
  updateTaskStatus(student, courseId, taskId, answers.status);
  persist(db);
  console.log('Status updated!');
}

async function createCourse(db: DatabaseDocument, student: Student): Promise<void> {
  const answers = await inquirer.prompt<{ code: string; name: string }>([
    { type: 'input', name: 'code', message: 'Course code:' },
    { type: 'input', name: 'name', message: 'Course name (optional):' },
  ]);
  const course = addCourse(student, answers.code, answers.name);
  persist(db);
  console.log(`Course '${course.id}' added successfully!`);
}

async function runAction(action: MenuAction, db: DatabaseDocument, student: Student): Promise<void> {
  const needsCourse = action === 'session' || action === 'task';
  if (needsCourse && student.courses.length === 0) {
    console.log('Add a course first.');
    return;
  }

  switch (action) {
    case 'session':
      return runStudySession(db, student);
    case 'task':
      return createTask(db, student);
    case 'status':
      return changeTaskStatus(db, student);
    case 'course':
      return createCourse(db, student);
    case 'report':
      printReport(buildReport(student, toDateKey(new Date()), new Date()));
      return;
    default:
      return;
  }
}

export const menuCommand = new Command('menu')
  .description('Interactive menu')
  .action(async () => {
    try {
      const db = loadDatabase();
      let student = getCurrentStudent(db) ?? (await signIn(db));

      while (student) {
        const tasks = listTasks(student);
        const sessions = student.courses.flatMap((c) => c.sessions);
        console.log(`\n=== Dashboard - ${student.email} ===`);
        console.log(
          `Stats: ${student.courses.length} Courses | ${tasks.length} Tasks | ${sessions.length} Sessions`
        );

        const { action } = await inquirer.prompt<{ action: MenuAction }>([
          {
            type: 'list',
            name: 'action',
            message: 'Select an option:',
            choices: [
              { name: 'Start Study Session', value: 'session' },
              { name: 'Add New Task', value: 'task' },
              { name: 'Update Task Status', value: 'status' },
              { name: 'Add New Course', value: 'course' },
              { name: 'View Analytics Report', value: 'report' },
              { name: 'Logout', value: 'logout' },
              { name: 'Save & Exit', value: 'exit' },
            ],
          },
        ]);

        if (action === 'exit') {
          persist(db);
          console.log('Data saved! Goodbye!');
          return;
        }

        if (action === 'logout') {
          logout(db);
          persist(db);
          console.log('Logged out.');
          student = await signIn(db);
          continue;
        }

        try {
          await runAction(action, db, student);
        } catch (error) {
          // Bad input and invalid timer operations keep the loop alive
          if (!isTrackerError(error)) throw error;
          console.error(`\nError: ${error.message}`);
        }
        await pause();
      }
    } catch (error) {
      logger.error(`Menu failed: ${error}`);
      console.error(`\nFATAL ERROR: ${error}`);
      process.exit(1);
    }
  });
