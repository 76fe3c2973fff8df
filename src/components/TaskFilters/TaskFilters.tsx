import { memo } from 'react';
import { FunnelIcon } from '@heroicons/react/20/solid';
import type { CompletionFilter, FilterState } from '@modules/types';
import { completionOptions } from '@modules/filters';
import { aria } from './aria';

interface TaskFiltersProps {
  filters: FilterState;
  categoryOptions: string[];
  priorityOptions: string[];
  onCategoryChange: (value: string) => void;
  onPriorityChange: (value: string) => void;
  onCompletionChange: (value: CompletionFilter) => void;
  onDateChange: (value: string | null) => void;
  onReset: () => void;
}

const selectClass =
  'rounded-md border border-gray-300 bg-white px-2 py-1 text-xs focus:border-indigo-500 focus:ring-indigo-500 sm:text-sm';

function TaskFilters({
  filters,
  categoryOptions,
  priorityOptions,
  onCategoryChange,
  onPriorityChange,
  onCompletionChange,
  onDateChange,
  onReset,
}: TaskFiltersProps) {
  function handleCompletionChange(value: string) {
    const option = completionOptions.find((o) => o === value);
    if (option) onCompletionChange(option);
  }

  return (
    <div className="flex flex-wrap items-center gap-2 px-1 sm:gap-3 sm:px-2 lg:px-4">
      <FunnelIcon aria-hidden="true" className="h-4 w-4 text-gray-400" />
      <select
        value={filters.category}
        onChange={(e) => onCategoryChange(e.target.value)}
        {...aria.category}
        className={selectClass}
      >
        {categoryOptions.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
      <select
        value={filters.priority}
        onChange={(e) => onPriorityChange(e.target.value)}
        {...aria.priority}
        className={selectClass}
      >
        {priorityOptions.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
      <select
        value={filters.completion}
        onChange={(e) => handleCompletionChange(e.target.value)}
        {...aria.completion}
        className={selectClass}
      >
        {completionOptions.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
      <input
        type="date"
        value={filters.date ?? ''}
        onChange={(e) => onDateChange(e.target.value || null)}
        {...aria.date}
        className={selectClass}
      />
      <button
        type="button"
        onClick={onReset}
        className="rounded-md px-2 py-1 text-xs font-medium text-gray-600 hover:bg-gray-100 hover:text-gray-800 sm:text-sm"
      >
        Reset filters
      </button>
    </div>
  );
}

export default memo(TaskFilters);
