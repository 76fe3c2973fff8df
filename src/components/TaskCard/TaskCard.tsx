import { useEffect, useRef } from 'react';
import type { MouseEvent } from 'react';
import { PencilSquareIcon, TrashIcon } from '@heroicons/react/20/solid';
import type { Task } from '@modules/types';
import { palette, type PaletteKey } from '@modules/palette';
import { formatDueDate, isOverdue } from '@modules/dates';
import { aria } from './aria';

interface Props {
  task: Task;
  /** Reference day for the overdue highlight, `yyyy-MM-dd`. */
  today: string;
  onEdit?: () => void;
  onToggle?: () => void;
  onDelete?: () => void;
}

function statusOf(task: Task, today: string): PaletteKey {
  if (task.completed) return 'done';
  if (isOverdue(task.dueDate, today)) return 'overdue';
  return task.dueDate ? 'due' : 'open';
}

export default function TaskCard({ task, today, onEdit, onToggle, onDelete }: Props) {
  const status = statusOf(task, today);
  const clickTimeout = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(() => () => {
    if (clickTimeout.current) clearTimeout(clickTimeout.current);
  }, []);

  // a double click toggles completion; a single click opens the editor once
  // the double-click window has passed
  function handleClick(ev: MouseEvent<HTMLDivElement>) {
    if (ev.detail === 2) {
      if (clickTimeout.current) {
        clearTimeout(clickTimeout.current);
        clickTimeout.current = null;
      }
      onToggle?.();
    } else if (ev.detail === 1) {
      if (clickTimeout.current) {
        clearTimeout(clickTimeout.current);
      }
      clickTimeout.current = setTimeout(() => {
        clickTimeout.current = null;
        onEdit?.();
      }, 250);
    }
  }

  return (
    <li
      {...aria.root(task.name)}
      style={{ borderColor: palette[status] }}
      className="flex w-full items-start gap-2 rounded-lg border-l-4 bg-white px-2 py-2 text-xs text-gray-800 shadow transition-shadow hover:shadow-md sm:gap-3 sm:px-4 sm:py-3 sm:text-sm"
    >
      <input
        type="checkbox"
        checked={task.completed}
        onChange={() => onToggle?.()}
        {...aria.toggle(task)}
        className="mt-0.5 h-4 w-4 cursor-pointer rounded border-gray-300 text-indigo-600 focus:ring-indigo-500"
      />
      <div onClick={handleClick} className="min-w-0 flex-1 cursor-pointer select-none">
        <div className={`font-medium break-words ${task.completed ? 'text-done line-through' : ''}`}>
          {task.name}
        </div>
        {task.description && (
          <div className="mt-1 whitespace-pre-line break-words text-[10px] text-gray-500 sm:text-xs overflow-hidden text-ellipsis task-card-note">
            {task.description}
          </div>
        )}
        <div className="mt-1 flex flex-wrap items-center gap-1 text-[10px] sm:text-xs">
          {task.category && (
            <span className="rounded-full bg-gray-100 px-2 py-0.5 text-gray-600">{task.category}</span>
          )}
          {task.priority !== undefined && (
            <span className="rounded-full bg-indigo-50 px-2 py-0.5 text-indigo-700">P{task.priority}</span>
          )}
          {task.dueDate && (
            <span className={status === 'overdue' ? 'font-semibold text-overdue' : 'text-gray-500'}>
              {status === 'overdue' ? 'Overdue · ' : 'Due '}
              {formatDueDate(task.dueDate)}
            </span>
          )}
        </div>
      </div>
      <div className="flex items-center gap-1">
        <button
          type="button"
          onClick={onEdit}
          {...aria.edit(task.name)}
          className="flex h-7 w-7 items-center justify-center rounded-md text-gray-500 hover:bg-gray-100 hover:text-gray-700"
        >
          <PencilSquareIcon aria-hidden="true" className="h-4 w-4" />
        </button>
        <button
          type="button"
          onClick={onDelete}
          {...aria.remove(task.name)}
          className="flex h-7 w-7 items-center justify-center rounded-md text-gray-500 hover:bg-red-50 hover:text-red-600"
        >
          <TrashIcon aria-hidden="true" className="h-4 w-4" />
        </button>
      </div>
    </li>
  );
}
