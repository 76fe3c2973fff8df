import type { Task } from '@modules/types';

export const aria = {
  root: (name: string) => ({
    'aria-label': name,
    'aria-roledescription': 'Task'
  }),
  toggle: (task: Task) => ({
    'aria-label': task.completed ? `Mark ${task.name} as not completed` : `Mark ${task.name} as completed`
  }),
  edit: (name: string) => ({ 'aria-label': `Edit ${name}` }),
  remove: (name: string) => ({ 'aria-label': `Delete ${name}` })
};
