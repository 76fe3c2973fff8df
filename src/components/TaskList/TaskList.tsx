import TaskCard from '@components/TaskCard';
import type { Task } from '@modules/types';
import { aria } from './aria';

interface Props {
  tasks: Task[];
  /** Size of the unfiltered collection, to tell "empty" from "filtered out". */
  totalCount: number;
  today: string;
  onEdit?: (task: Task) => void;
  onToggle?: (id: string) => void;
  onDelete?: (id: string) => void;
}

export default function TaskList({ tasks, totalCount, today, onEdit, onToggle, onDelete }: Props) {
  if (tasks.length === 0) {
    return (
      <p {...aria.empty} className="w-full py-8 text-center text-sm text-gray-500">
        {totalCount === 0
          ? 'No tasks yet. Add one to get started.'
          : 'No tasks match the current filters.'}
      </p>
    );
  }

  return (
    <ul {...aria.list} className="flex w-full flex-col gap-1 px-1 sm:gap-2 sm:px-2 lg:px-4">
      {tasks.map((task) => (
        <TaskCard
          key={task.id}
          task={task}
          today={today}
          onEdit={() => onEdit?.(task)}
          onToggle={() => onToggle?.(task.id)}
          onDelete={() => onDelete?.(task.id)}
        />
      ))}
    </ul>
  );
}
