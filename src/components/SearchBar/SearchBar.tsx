import { memo } from 'react';
import { MagnifyingGlassIcon, XMarkIcon } from '@heroicons/react/20/solid';
import { aria } from './aria';

interface SearchBarProps {
  value: string;
  onChange: (value: string) => void;
}

function SearchBar({ value, onChange }: SearchBarProps) {
  return (
    <div className="relative flex-1 px-1 sm:px-2 lg:px-4">
      <MagnifyingGlassIcon
        aria-hidden="true"
        className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-gray-400 sm:left-4 lg:left-6"
      />
      <input
        type="text"
        placeholder="Search tasks..."
        value={value}
        onChange={(e) => onChange(e.target.value)}
        {...aria.input}
        className="w-full rounded-md border border-gray-300 py-1 pl-7 pr-7 text-xs focus:border-indigo-500 focus:ring-indigo-500 sm:py-1 sm:text-sm"
      />
      {value && (
        <button
          type="button"
          onClick={() => onChange('')}
          {...aria.clear}
          className="absolute right-3 top-1/2 -translate-y-1/2 text-gray-400 hover:text-gray-600 sm:right-4 lg:right-6"
        >
          <XMarkIcon className="h-4 w-4" />
        </button>
      )}
    </div>
  );
}

export default memo(SearchBar);
