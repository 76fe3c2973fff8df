import { Fragment, useState, useEffect } from 'react';
import { Dialog, Transition } from '@headlessui/react';
import type { Task, TaskFields } from '@modules/types';
import {
  toFormValues,
  validateTaskForm,
  type TaskFormErrors,
  type TaskFormValues,
} from '@modules/forms';

interface Props {
  isOpen: boolean;
  onClose: () => void;
  onSave: (fields: TaskFields) => void;
  task?: Task | null;                 // edit this task instead of adding one
  categorySuggestions?: string[];
}

const inputClass =
  'mt-1 w-full rounded-md border border-gray-300 p-2.5 text-base focus:border-indigo-500 focus:ring-indigo-500';

function FieldError({ message }: { message?: string }) {
  if (!message) return null;
  return <p className="mt-1 text-xs text-red-600">{message}</p>;
}

export default function TaskModal({
  isOpen,
  onClose,
  onSave,
  task = null,
  categorySuggestions = []
}: Props) {
  const [values, setValues] = useState<TaskFormValues>(() => toFormValues(task ?? undefined));
  const [errors, setErrors] = useState<TaskFormErrors>({});
  const isEditing = task !== null;

  // start from the edited task (or a blank form) every time the dialog opens
  useEffect(() => {
    if (isOpen) {
      setValues(toFormValues(task ?? undefined));
      setErrors({});
    }
  }, [task, isOpen]);

  function update<K extends keyof TaskFormValues>(key: K, value: TaskFormValues[K]) {
    setValues((current) => ({ ...current, [key]: value }));
  }

  function handleSave() {
    const result = validateTaskForm(values);
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    onSave(result.fields);
    onClose();
  }

  return (
    <Transition appear show={isOpen} as={Fragment}>
      <Dialog as="div" className="relative z-50" onClose={onClose}>
        <Transition.Child
          as={Fragment}
          enter="ease-out duration-200" enterFrom="opacity-0" enterTo="opacity-100"
          leave="ease-in duration-150" leaveFrom="opacity-100" leaveTo="opacity-0"
        >
          <div className="fixed inset-0 bg-black/30" />
        </Transition.Child>

        <div className="fixed inset-0 flex items-center justify-center p-4">
          <Transition.Child
            as={Fragment}
            enter="ease-out duration-200" enterFrom="scale-95 opacity-0" enterTo="scale-100 opacity-100"
            leave="ease-in duration-150" leaveFrom="scale-100 opacity-100" leaveTo="scale-95 opacity-0"
          >
            <Dialog.Panel className="w-full max-w-md rounded-xl bg-white p-6 shadow-xl">
              <Dialog.Title className="mb-4 text-lg font-bold">
                {isEditing ? 'Edit Task' : 'Add Task'}
              </Dialog.Title>

              <label className="block text-sm font-medium text-gray-700">
                Name<span className="text-red-500">*</span>
                <input
                  type="text"
                  className={inputClass}
                  value={values.name}
                  onChange={e => update('name', e.target.value)}
                  placeholder="Buy birthday gift…"
                  autoFocus
                />
              </label>
              <FieldError message={errors.name} />

              <label className="mt-4 block text-sm font-medium text-gray-700">
                Description
                <textarea
                  rows={3}
                  className={inputClass}
                  value={values.description}
                  onChange={e => update('description', e.target.value)}
                  placeholder="Optional details or link"
                />
              </label>

              <div className="mt-4 grid grid-cols-1 gap-4 sm:grid-cols-2">
                <label className="block text-sm font-medium text-gray-700">
                  Category
                  <input
                    type="text"
                    list="task-category-suggestions"
                    className={inputClass}
                    value={values.category}
                    onChange={e => update('category', e.target.value)}
                  />
                  <datalist id="task-category-suggestions">
                    {categorySuggestions.map((c) => (
                      <option key={c} value={c} />
                    ))}
                  </datalist>
                </label>

                <div>
                  <label className="block text-sm font-medium text-gray-700">
                    Priority
                    <input
                      type="text"
                      inputMode="numeric"
                      className={inputClass}
                      value={values.priority}
                      onChange={e => update('priority', e.target.value)}
                    />
                  </label>
                  <FieldError message={errors.priority} />
                </div>
              </div>

              <label className="mt-4 block text-sm font-medium text-gray-700">
                Due date
                <input
                  type="date"
                  className={inputClass}
                  value={values.dueDate}
                  onChange={e => update('dueDate', e.target.value)}
                />
              </label>
              <FieldError message={errors.dueDate} />

              {isEditing && (
                <label className="mt-4 flex items-center gap-2 text-sm font-medium text-gray-700">
                  <input
                    type="checkbox"
                    checked={values.completed}
                    onChange={e => update('completed', e.target.checked)}
                  />
                  Completed
                </label>
              )}

              <div className="mt-6 flex justify-end gap-3">
                <button
                  type="button"
                  onClick={onClose}
                  className="rounded-md bg-gray-100 px-4 py-2 text-sm font-medium text-gray-700 hover:bg-gray-200"
                >
                  Cancel
                </button>
                <button
                  type="button"
                  onClick={handleSave}
                  className="rounded-md bg-indigo-600 px-4 py-2 text-sm font-medium text-white hover:bg-indigo-700"
                >
                  Save
                </button>
              </div>
            </Dialog.Panel>
          </Transition.Child>
        </div>
      </Dialog>
    </Transition>
  );
}
