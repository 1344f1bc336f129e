import { Command } from 'commander';
import inquirer from 'inquirer';
import { loadDatabase } from '../../storage/database.js';
import { registerStudent } from '../../auth/accounts.js';
import { persist, reportFailure } from '../workspace.js';

type RegisterAnswers = {
  email: string;
  name: string;
  studentId: string;
  password: string;
};

export const registerCommand = new Command('register')
  .description('Create a new student account')
  .option('-e, --email <email>', 'Email address')
  .option('-n, --name <name>', 'Full name')
  .option('-s, --student-id <id>', 'Student number')
  .action(async (options: { email?: string; name?: string; studentId?: string }) => {
    try {
      const db = loadDatabase();

      const answers = await inquirer.prompt<RegisterAnswers>(
        [
          { type: 'input', name: 'email', message: 'Email:' },
          { type: 'input', name: 'name', message: 'Name:' },
          { type: 'input', name: 'studentId', message: 'Student ID:' },
          { type: 'password', name: 'password', message: 'Password (8+ characters):', mask: '*' },
        ],
        { email: options.email, name: options.name, studentId: options.studentId }
      );

      const student = await registerStudent(db, answers);
      persist(db);
      console.log(`\nAccount created. Logged in as ${student.email}.`);
    } catch (error) {
      reportFailure('Registration', error);
    }
  });
