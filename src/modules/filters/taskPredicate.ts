import type { CompletionFilter, FilterState, Task } from '@modules/types';

export const ALL_CATEGORIES = 'All Categories';
export const ALL_PRIORITIES = 'All Priorities';
export const ALL_TASKS: CompletionFilter = 'All Tasks';

export const completionOptions: readonly CompletionFilter[] = [
  'All Tasks',
  'Completed',
  'Not Completed'
];

export const defaultFilters: FilterState = {
  category: ALL_CATEGORIES,
  priority: ALL_PRIORITIES,
  completion: ALL_TASKS,
  date: null,
  keyword: ''
};

export type TaskPredicate = (task: Task | null | undefined) => boolean;

function containsFolded(value: string | undefined, needle: string) {
  return value !== undefined && value.toLowerCase().includes(needle);
}

function matchesKeyword(task: Task, needle: string) {
  return (
    containsFolded(task.name, needle) ||
    containsFolded(task.description, needle) ||
    containsFolded(task.category, needle) ||
    // numeric and date text are compared as-is
    (task.priority !== undefined && String(task.priority).includes(needle)) ||
    (task.dueDate !== undefined && task.dueDate.includes(needle))
  );
}

/**
 * Builds the membership test for the filtered view. Every criterion must
 * hold; a missing criterion (or its "All" sentinel) places no constraint.
 */
export function buildTaskPredicate(criteria: Partial<FilterState>): TaskPredicate {
  const { category, priority, completion, date, keyword } = criteria;
  const needle = keyword !== undefined && keyword.trim() !== '' ? keyword.toLowerCase() : null;
  const wantedCategory =
    category !== undefined && category !== ALL_CATEGORIES ? category.toLowerCase() : null;
  const wantedPriority = priority !== undefined && priority !== ALL_PRIORITIES ? priority : null;

  return (task) => {
    if (!task) return false;

    if (wantedCategory !== null) {
      if (task.category === undefined || task.category.toLowerCase() !== wantedCategory) {
        return false;
      }
    }

    if (wantedPriority !== null) {
      if (task.priority === undefined || String(task.priority) !== wantedPriority) {
        return false;
      }
    }

    if (completion === 'Completed' && !task.completed) return false;
    if (completion === 'Not Completed' && task.completed) return false;

    if (date && task.dueDate !== date) return false;

    if (needle !== null && !matchesKeyword(task, needle)) return false;

    return true;
  };
}

export function filterTasks(tasks: readonly Task[], criteria: Partial<FilterState>): Task[] {
  return tasks.filter(buildTaskPredicate(criteria));
}
