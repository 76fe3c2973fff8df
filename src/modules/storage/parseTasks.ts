import { v4 as uuid } from 'uuid';
import type { Task } from '@modules/types';
import { isCalendarDate } from '@modules/dates';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : null;
}

function optionalInteger(value: unknown): number | undefined | null {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

export function parseTask(value: unknown): Task | null {
  if (!isRecord(value)) return null;

  const { id, name, completed = false } = value;
  if (typeof name !== 'string' || typeof completed !== 'boolean') return null;

  const description = optionalString(value.description);
  const category = optionalString(value.category);
  const dueDate = optionalString(value.dueDate);
  const priority = optionalInteger(value.priority);
  if (description === null || category === null || dueDate === null || priority === null) {
    return null;
  }
  if (dueDate !== undefined && !isCalendarDate(dueDate)) return null;

  const task: Task = {
    id: typeof id === 'string' && id ? id : uuid(),
    name,
    completed
  };
  if (description !== undefined) task.description = description;
  if (category !== undefined) task.category = category;
  if (priority !== undefined) task.priority = priority;
  if (dueDate !== undefined) task.dueDate = dueDate;
  return task;
}

/** Reads whatever the store held; malformed records are dropped. */
export function parseTasks(payload: unknown): Task[] {
  if (!Array.isArray(payload)) return [];
  const tasks: Task[] = [];
  for (const entry of payload) {
    const task = parseTask(entry);
    if (task) {
      tasks.push(task);
    } else {
      console.warn('[storage] dropping malformed task record', entry);
    }
  }
  return tasks;
}
