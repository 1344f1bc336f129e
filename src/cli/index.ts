import { Command } from 'commander';
import { registerCommand } from './commands/register.js';
import { loginCommand } from './commands/login.js';
import { courseCommand } from './commands/course.js';
import { taskCommand } from './commands/task.js';
import { sessionCommand } from './commands/session.js';
import { reportCommand } from './commands/report.js';
import { statusCommand } from './commands/status.js';
import { menuCommand } from './commands/menu.js';
import { resetCommand } from './commands/reset.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('study-tracker')
    .description('Track courses, tasks and study sessions, and see how productive you are')
    .version('1.0.0');

  program.addCommand(registerCommand);
  program.addCommand(loginCommand);
  program.addCommand(courseCommand);
  program.addCommand(taskCommand);
  program.addCommand(sessionCommand);
  program.addCommand(reportCommand);
  program.addCommand(statusCommand);
  program.addCommand(menuCommand);
  program.addCommand(resetCommand);

  return program;
}
