import type { Task } from '@modules/types';
import { ALL_CATEGORIES, ALL_PRIORITIES } from './taskPredicate';

/**
 * Sentinel first, then every non-blank category in the order it first
 * appears. Distinctness is exact string equality, so "Work" and "work"
 * are both offered.
 */
export function collectCategoryOptions(tasks: readonly Task[]): string[] {
  const seen = new Set<string>();
  for (const task of tasks) {
    if (task.category !== undefined && task.category.trim() !== '') {
      seen.add(task.category);
    }
  }
  return [ALL_CATEGORIES, ...seen];
}

export function collectPriorityOptions(tasks: readonly Task[]): string[] {
  const seen = new Set<string>();
  for (const task of tasks) {
    if (task.priority !== undefined) {
      seen.add(String(task.priority));
    }
  }
  return [ALL_PRIORITIES, ...seen];
}

/** Keeps `previous` while it is still offered, else falls back to the sentinel. */
export function reconcileSelection(options: readonly string[], previous: string | null | undefined): string {
  if (previous !== null && previous !== undefined && options.includes(previous)) {
    return previous;
  }
  return options[0];
}
