import type { FilterState, Task, TaskFields } from "@modules/types";
import { collectCategoryOptions, collectPriorityOptions } from "@modules/filters";
import { isOverdue } from "@modules/dates";
import {
  filtersReducer,
  initialState as filtersInitialState,
  type Action as FilterAction,
} from "../filters";

type State = {
  tasks: Task[];
  filters: FilterState;
  /** Bumped by refresh-view so the derived list is rebuilt without a data change. */
  revision: number;
};

const initialState: State = {
  tasks: [],
  filters: filtersInitialState,
  revision: 0,
};

/** Stored tasks go first; anything added before the load finished follows. */
type LoadTasksAction = { type: "load-tasks"; tasks: Task[] };

type AddTaskAction = { type: "add-task"; taskId: string; fields: TaskFields };

type UpdateTaskAction = {
  type: "update-task";
  id: string;
  changes: Partial<TaskFields>;
};

type ToggleTaskAction = { type: "toggle-task"; id: string };

type DeleteTaskAction = { type: "delete-task"; id: string };

type ClearCompletedAction = { type: "clear-completed" };

/** `today` is fixed by the caller so every task is judged against the same day. */
type ClearOverdueAction = { type: "clear-overdue"; today: string };

type RefreshViewAction = { type: "refresh-view" };

type Action =
  | LoadTasksAction
  | AddTaskAction
  | UpdateTaskAction
  | ToggleTaskAction
  | DeleteTaskAction
  | ClearCompletedAction
  | ClearOverdueAction
  | RefreshViewAction
  | FilterAction;

function syncFilters(filters: FilterState, tasks: Task[]): FilterState {
  return filtersReducer(filters, {
    type: "sync-options",
    categories: collectCategoryOptions(tasks),
    priorities: collectPriorityOptions(tasks),
  });
}

// Option lists are re-derived before the caller sees the new tasks, so the
// view is never filtered against a selection that no longer exists.
function withTasks(state: State, tasks: Task[]): State {
  if (tasks === state.tasks) return state;
  return { ...state, tasks, filters: syncFilters(state.filters, tasks) };
}

function removeWhere(state: State, shouldRemove: (task: Task) => boolean): State {
  if (state.tasks.length === 0) return state;
  const kept = state.tasks.filter((t) => !shouldRemove(t));
  return kept.length === state.tasks.length ? state : withTasks(state, kept);
}

function replaceTask(state: State, id: string, update: (task: Task) => Task): State {
  const idx = state.tasks.findIndex((t) => t.id === id);
  if (idx < 0) return state;
  const tasks = [...state.tasks];
  tasks[idx] = update(tasks[idx]);
  return withTasks(state, tasks);
}

export function tasksReducer(state: State, action: Action): State {
  switch (action.type) {
    case "load-tasks":
      return withTasks(
        state,
        state.tasks.length === 0 ? action.tasks : [...action.tasks, ...state.tasks]
      );
    case "add-task": {
      const task: Task = { ...action.fields, id: action.taskId };
      return withTasks(state, [...state.tasks, task]);
    }
    case "update-task":
      return replaceTask(state, action.id, (t) => {
        const next: Task = { ...t, ...action.changes };
        // an edit that clears an optional field passes it as undefined
        for (const key of ["description", "category", "priority", "dueDate"] as const) {
          if (key in action.changes && action.changes[key] === undefined) {
            delete next[key];
          }
        }
        return next;
      });
    case "toggle-task":
      return replaceTask(state, action.id, (t) => ({ ...t, completed: !t.completed }));
    case "delete-task":
      return removeWhere(state, (t) => t.id === action.id);
    case "clear-completed":
      return removeWhere(state, (t) => t.completed);
    case "clear-overdue":
      return removeWhere(state, (t) => isOverdue(t.dueDate, action.today));
    case "refresh-view":
      return {
        ...state,
        filters: syncFilters(state.filters, state.tasks),
        revision: state.revision + 1,
      };
    default: {
      const filters = filtersReducer(state.filters, action);
      return filters === state.filters ? state : { ...state, filters };
    }
  }
}

export { initialState };
export type { State, Action };
