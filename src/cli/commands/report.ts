import { Command } from 'commander';
import { buildReport } from '../../analytics/engine.js';
import { toDateKey } from '../../utils/dates.js';
import { formatSession, printReport } from '../render.js';
import { openWorkspace, reportFailure } from '../workspace.js';

export const reportCommand = new Command('report')
  .description('Show productivity analytics')
  .option('--date <date>', 'Day to summarize (YYYY-MM-DD)', toDateKey(new Date()))
  .option('--sessions', 'List the sessions of that day')
  .option('--json', 'Print the report as JSON')
  .action((options: { date: string; sessions?: boolean; json?: boolean }) => {
    try {
      const { student } = openWorkspace();
      const report = buildReport(student, options.date, new Date());

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      printReport(report);
      if (options.sessions && report.day.sessions.length > 0) {
        console.log('=== Sessions ===');
        for (const session of report.day.sessions) {
          console.log(`  ${formatSession(session)}`);
        }
        console.log('');
      }
    } catch (error) {
      reportFailure('Report', error);
    }
  });
