import type { Task, TaskFields } from '@modules/types';
import { isCalendarDate } from '@modules/dates';

export interface TaskFormValues {
  name: string;
  description: string;
  category: string;
  priority: string;
  dueDate: string;
  completed: boolean;
}

export type TaskFormErrors = Partial<Record<'name' | 'priority' | 'dueDate', string>>;

export type TaskFormResult =
  | { ok: true; fields: TaskFields }
  | { ok: false; errors: TaskFormErrors };

const WHOLE_NUMBER = /^-?\d+$/;

export function toFormValues(task?: Task): TaskFormValues {
  return {
    name: task?.name ?? '',
    description: task?.description ?? '',
    category: task?.category ?? '',
    priority: task?.priority === undefined ? '' : String(task.priority),
    dueDate: task?.dueDate ?? '',
    completed: task?.completed ?? false
  };
}

export function validateTaskForm(values: TaskFormValues): TaskFormResult {
  const errors: TaskFormErrors = {};
  const name = values.name.trim();
  const category = values.category.trim();
  const priority = values.priority.trim();
  const dueDate = values.dueDate.trim();

  if (!name) errors.name = 'Name is required';
  // digit strings past 2^53 would be stored rounded
  if (priority && (!WHOLE_NUMBER.test(priority) || !Number.isSafeInteger(Number(priority)))) {
    errors.priority = 'Priority must be a whole number';
  }
  if (dueDate && !isCalendarDate(dueDate)) {
    errors.dueDate = 'Due date must be a valid date';
  }
  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }

  const fields: TaskFields = { name, completed: values.completed };
  if (values.description.trim()) fields.description = values.description;
  if (category) fields.category = category;
  if (priority) fields.priority = Number.parseInt(priority, 10);
  if (dueDate) fields.dueDate = dueDate;
  return { ok: true, fields };
}
