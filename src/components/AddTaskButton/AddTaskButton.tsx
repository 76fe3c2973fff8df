import { memo } from 'react';
import { PlusIcon } from '@heroicons/react/24/solid';
import { aria } from './aria';

interface AddTaskButtonProps {
  onAdd: () => void;
  disabled?: boolean;
}

function AddTaskButton({ onAdd, disabled = false }: AddTaskButtonProps) {
  return (
    <div className="flex items-center">
      <button
        type="button"
        onClick={onAdd}
        disabled={disabled}
        {...aria.button}
        className="flex items-center gap-1 rounded-full bg-accent text-white hover:bg-indigo-700 focus:outline-none focus:ring-2 focus:ring-indigo-500 disabled:cursor-not-allowed disabled:opacity-50 h-8 px-2 sm:h-10 sm:px-4"
      >
        <PlusIcon aria-hidden="true" className="h-5 w-5" />
        <span className="hidden text-sm font-medium sm:inline">Add Task</span>
      </button>
    </div>
  );
}

export default memo(AddTaskButton);
