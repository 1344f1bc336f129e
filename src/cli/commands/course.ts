import { Command } from 'commander';
import { addCourse, removeCourse } from '../../models/student.js';
import { productivityScore } from '../../analytics/engine.js';
import { openWorkspace, persist, reportFailure } from '../workspace.js';

export const courseCommand = new Command('course').description('Manage courses');

courseCommand
  .command('add <code>')
  .description('Add a course')
  .option('-n, --name <name>', 'Descriptive course name')
  .action((code: string, options: { name?: string }) => {
    try {
      const { db, student } = openWorkspace();
      const course = addCourse(student, code, options.name);
      persist(db);
      console.log(`Course '${course.id}' added successfully!`);
    } catch (error) {
      reportFailure('Adding course', error);
    }
  });

courseCommand
  .command('remove <code>')
  .description('Remove a course with all its tasks and sessions')
  .action((code: string) => {
    try {
      const { db, student } = openWorkspace();
      const course = removeCourse(student, code);
      persist(db);
      console.log(`Removed ${course.id} (${course.tasks.length} tasks, ${course.sessions.length} sessions).`);
    } catch (error) {
      reportFailure('Removing course', error);
    }
  });

courseCommand
  .command('list')
  .description('List courses')
  .action(() => {
    try {
      const { student } = openWorkspace();
      if (student.courses.length === 0) {
        console.log('No courses yet.');
        return;
      }
      for (const course of student.courses) {
        const running = student.activeSessions.some((s) => s.courseId === course.id) ? ' [timer running]' : '';
        console.log(
          `${course.id.padEnd(10)} ${course.name}  (${course.tasks.length} tasks, score ${productivityScore(course)})${running}`
        );
      }
    } catch (error) {
      reportFailure('Listing courses', error);
    }
  });
