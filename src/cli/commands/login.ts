import { Command } from 'commander';
import inquirer from 'inquirer';
import { loadDatabase } from '../../storage/database.js';
import { authenticate, getCurrentStudent, logout } from '../../auth/accounts.js';
import { persist, reportFailure } from '../workspace.js';

type LoginAnswers = {
  email: string;
  password: string;
};

export const loginCommand = new Command('login')
  .description('Log in as a registered student')
  .option('-e, --email <email>', 'Email address')
  .option('--status', 'Show who is logged in')
  .option('--clear', 'Log out')
  .action(async (options: { email?: string; status?: boolean; clear?: boolean }) => {
    try {
      const db = loadDatabase();

      if (options.clear) {
        logout(db);
        persist(db);
        console.log('Logged out.');
        return;
      }

      if (options.status) {
        const student = getCurrentStudent(db);
        if (!student) {
          console.log('Not logged in. Run "study-tracker login" to authenticate.');
          process.exit(1);
        }
        console.log(`Logged in as ${student.name} <${student.email}>.`);
        return;
      }

      const answers = await inquirer.prompt<LoginAnswers>(
        [
          { type: 'input', name: 'email', message: 'Email:' },
          { type: 'password', name: 'password', message: 'Password:', mask: '*' },
        ],
        { email: options.email }
      );

      const student = await authenticate(db, answers.email, answers.password);
      persist(db);
      console.log(`\nLogin successful! Welcome back, ${student.name}.`);
    } catch (error) {
      reportFailure('Login', error);
    }
  });
