export interface Task {
  id: string;
  name: string;
  description?: string;
  category?: string;
  priority?: number;
  /** Calendar day as `yyyy-MM-dd`. */
  dueDate?: string;
  completed: boolean;
}

export type TaskFields = Omit<Task, 'id'>;

export type CompletionFilter = 'All Tasks' | 'Completed' | 'Not Completed';

export interface FilterState {
  category: string;
  priority: string;
  completion: CompletionFilter;
  /** Exact due date to match, `yyyy-MM-dd`. */
  date: string | null;
  keyword: string;
}
