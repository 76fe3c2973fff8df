import { get, set } from 'idb-keyval';
import type { Task } from '@modules/types';
import { config } from '@modules/config';
import { parseTasks } from './parseTasks';

export interface TaskStore {
  load(): Promise<Task[]>;
  save(tasks: readonly Task[]): Promise<void>;
}

export function createTaskStore(key: string = config.storageKey): TaskStore {
  return {
    async load() {
      return parseTasks(await get<unknown>(key));
    },
    async save(tasks) {
      await set(key, tasks);
    }
  };
}

export const taskStore = createTaskStore();
