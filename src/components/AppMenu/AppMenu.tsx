import { Fragment, memo } from 'react';
import { Menu, Transition } from '@headlessui/react';
import { Bars3Icon } from '@heroicons/react/24/solid';
import { aria } from './aria';

interface AppMenuProps {
  onAddTask: () => void;
  onClearCompleted: () => void;
  onClearOverdue: () => void;
  onAbout: () => void;
  /** Turns off the entries that change tasks, e.g. while the list is loading. */
  disabled?: boolean;
}

function AppMenu({ onAddTask, onClearCompleted, onClearOverdue, onAbout, disabled = false }: AppMenuProps) {
  const items = [
    { label: 'Add Task', onSelect: onAddTask, changesTasks: true },
    { label: 'Clear Completed', onSelect: onClearCompleted, changesTasks: true },
    { label: 'Clear Overdue', onSelect: onClearOverdue, changesTasks: true },
    { label: 'About', onSelect: onAbout, changesTasks: false },
  ];

  return (
    <div className="relative">
      <Menu as="div" className="flex">
        <Menu.Button {...aria.button} className="rounded-md p-1 text-gray-600 hover:bg-gray-100 focus:outline-none">
          <Bars3Icon aria-hidden="true" className="h-6 w-6 sm:h-7 sm:w-7" />
        </Menu.Button>
        <Transition
          as={Fragment}
          enter="transition ease-out duration-100"
          enterFrom="transform opacity-0 scale-95"
          enterTo="transform opacity-100 scale-100"
          leave="transition ease-in duration-75"
          leaveFrom="transform opacity-100 scale-100"
          leaveTo="transform opacity-0 scale-95"
        >
          <Menu.Items className="absolute left-0 z-40 mt-10 w-48 origin-top-left rounded-md bg-white p-1 shadow-lg ring-1 ring-black ring-opacity-5 focus:outline-none">
            {items.map(({ label, onSelect, changesTasks }) => (
              <Menu.Item key={label} disabled={disabled && changesTasks}>
                {({ active }) => (
                  <button
                    type="button"
                    onClick={onSelect}
                    disabled={disabled && changesTasks}
                    className={`${active ? 'bg-gray-100' : ''} block w-full rounded px-2 py-1 text-left text-sm disabled:cursor-not-allowed disabled:text-gray-400`}
                  >
                    {label}
                  </button>
                )}
              </Menu.Item>
            ))}
          </Menu.Items>
        </Transition>
      </Menu>
    </div>
  );
}

export default memo(AppMenu);
