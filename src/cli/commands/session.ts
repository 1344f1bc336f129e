import { Command } from 'commander';
import { SessionController, isSessionType } from '../../sessions/controller.js';
import { SESSION_TYPES } from '../../types/index.js';
import { TrackerError } from '../../utils/errors.js';
import { formatMinutes } from '../../utils/dates.js';
import { formatActive } from '../render.js';
import { openWorkspace, persist, reportFailure } from '../workspace.js';

export const sessionCommand = new Command('session').description('Time study sessions');

sessionCommand
  .command('start <course>')
  .description('Start the study timer for a course')
  .option('-t, --task <id>', 'Task being worked on')
  .option('--type <type>', `Session type (${SESSION_TYPES.join(', ')})`, 'study')
  .action((course: string, options: { task?: string; type: string }) => {
    try {
      if (!isSessionType(options.type)) {
        throw new TrackerError(`Unknown session type "${options.type}"`, 'VALIDATION');
      }
      const { db, student } = openWorkspace();
      const controller = new SessionController();
      const handle = controller.start(student, course, { type: options.type, taskId: options.task });
      persist(db);
      console.log(`Timer started for ${handle.courseId}! Good luck studying!`);
      console.log(`Run "study-tracker session stop ${handle.courseId}" when you are done.`);
    } catch (error) {
      reportFailure('Starting session', error);
    }
  });

sessionCommand
  .command('stop <course>')
  .description('Stop the study timer for a course and record the session')
  .action((course: string) => {
    try {
      const { db, student } = openWorkspace();
      const controller = new SessionController();
      const active = controller.getActive(student, course);
      if (!active) {
        throw new TrackerError(`No study session is running for ${course}`, 'TIMER_NOT_RUNNING');
      }
      const session = controller.stop(student, { sessionId: active.id, courseId: active.courseId });
      persist(db);
      console.log(`Study session saved! You studied for ${formatMinutes(session.durationMinutes)}.`);
    } catch (error) {
      reportFailure('Stopping session', error);
    }
  });

sessionCommand
  .command('status')
  .description('Show running timers')
  .action(() => {
    try {
      const { student } = openWorkspace();
      const running = new SessionController().listActive(student);
      if (running.length === 0) {
        console.log('No timers running.');
        return;
      }
      const now = new Date();
      for (const active of running) {
        console.log(formatActive(active, now));
      }
    } catch (error) {
      reportFailure('Session status', error);
    }
  });
