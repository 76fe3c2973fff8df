import { useEffect, useMemo, useReducer, useRef, useState } from "react";
import { v4 as uuid } from "uuid";
import type { CompletionFilter, Task, TaskFields } from '@modules/types';
import { tasksReducer, initialState } from '@reducers';
import {
  collectCategoryOptions,
  collectPriorityOptions,
  filterTasks,
} from '@modules/filters';
import { taskStore, type TaskStore } from '@modules/storage';
import { today } from '@modules/dates';

const clearedOptionals = {
  description: undefined,
  category: undefined,
  priority: undefined,
  dueDate: undefined,
};

export function useTasks(store: TaskStore = taskStore) {
  const [state, dispatch] = useReducer(tasksReducer, initialState);
  const { tasks, filters, revision } = state;
  const [isLoading, setIsLoading] = useState(true);
  // the list as last read from or written to the store
  const persisted = useRef<Task[]>(initialState.tasks);

  useEffect(() => {
    let cancelled = false;
    async function loadStored() {
      try {
        const stored = await store.load();
        if (!cancelled) {
          persisted.current = stored;
          dispatch({ type: "load-tasks", tasks: stored });
        }
      } catch (err) {
        console.error("[tasks] failed to load tasks", err);
      } finally {
        if (!cancelled) setIsLoading(false);
      }
    }
    void loadStored();
    return () => {
      cancelled = true;
    };
  }, [store]);

  useEffect(() => {
    if (isLoading || tasks === persisted.current) return;
    persisted.current = tasks;
    store.save(tasks).catch((err: unknown) => {
      console.error("[tasks] failed to save tasks", err);
    });
  }, [tasks, isLoading, store]);

  const categoryOptions = useMemo(() => collectCategoryOptions(tasks), [tasks]);
  const priorityOptions = useMemo(() => collectPriorityOptions(tasks), [tasks]);
  const visibleTasks = useMemo(
    () => filterTasks(tasks, filters),
    // revision forces a rebuild on refreshView
    [tasks, filters, revision]
  );

  function addTask(fields: TaskFields) {
    dispatch({ type: "add-task", taskId: uuid(), fields });
  }

  function updateTask(id: string, changes: Partial<TaskFields>) {
    dispatch({ type: "update-task", id, changes });
  }

  /** Replaces every editable field; optionals missing from `fields` are cleared. */
  function editTask(id: string, fields: TaskFields) {
    updateTask(id, { ...clearedOptionals, ...fields });
  }

  function toggleTask(id: string) {
    dispatch({ type: "toggle-task", id });
  }

  function deleteTask(id: string) {
    dispatch({ type: "delete-task", id });
  }

  function clearCompleted() {
    dispatch({ type: "clear-completed" });
  }

  function clearOverdue() {
    dispatch({ type: "clear-overdue", today: today() });
  }

  function refreshView() {
    dispatch({ type: "refresh-view" });
  }

  const setFilter = {
    category: (value: string) => dispatch({ type: "set-category", value }),
    priority: (value: string) => dispatch({ type: "set-priority", value }),
    completion: (value: CompletionFilter) => dispatch({ type: "set-completion", value }),
    date: (value: string | null) => dispatch({ type: "set-date", value }),
    keyword: (value: string) => dispatch({ type: "set-keyword", value }),
    reset: () => dispatch({ type: "reset-filters" }),
  };

  return {
    tasks,
    visibleTasks,
    filters,
    categoryOptions,
    priorityOptions,
    isLoading,
    addTask,
    updateTask,
    editTask,
    toggleTask,
    deleteTask,
    clearCompleted,
    clearOverdue,
    refreshView,
    setFilter,
  };
}
