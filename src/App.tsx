import { useState, useCallback } from 'react';
import AppMenu from './components/AppMenu';
import SearchBar from './components/SearchBar';
import AddTaskButton from './components/AddTaskButton';
import TaskFilters from './components/TaskFilters';
import TaskList from './components/TaskList';
import TaskModal from './components/TaskModal';
import AboutDialog from './components/AboutDialog';
import { useTasks } from './hooks';
import type { Task, TaskFields } from '@modules/types';
import { config } from '@modules/config';
import { today } from '@modules/dates';
import { aria } from './aria';

export default function App() {
  const {
    tasks,
    visibleTasks,
    filters,
    categoryOptions,
    priorityOptions,
    isLoading,
    addTask,
    editTask,
    toggleTask,
    deleteTask,
    clearCompleted,
    clearOverdue,
    refreshView,
    setFilter,
  } = useTasks();
  const [isModalOpen, setIsModalOpen] = useState(false);
  const [editing, setEditing] = useState<Task | null>(null);
  const [isAboutOpen, setIsAboutOpen] = useState(false);

  const handleOpenModal = useCallback(() => {
    setEditing(null);
    setIsModalOpen(true);
  }, []);
  const handleOpenAbout = useCallback(() => setIsAboutOpen(true), []);

  function handleEdit(task: Task) {
    setEditing(task);
    setIsModalOpen(true);
  }

  function handleSave(fields: TaskFields) {
    if (editing) {
      editTask(editing.id, fields);
    } else {
      addTask(fields);
    }
  }

  function handleCloseModal() {
    setIsModalOpen(false);
    setEditing(null);
    refreshView();
  }

  return (
    <div className="flex min-h-screen flex-col p-2 space-y-2 sm:p-4 sm:space-y-4 lg:space-y-6">
      <header
        {...aria.header}
        className="flex items-center justify-between gap-2 sm:gap-4"
      >
        <AppMenu
          onAddTask={handleOpenModal}
          onClearCompleted={clearCompleted}
          onClearOverdue={clearOverdue}
          onAbout={handleOpenAbout}
          disabled={isLoading}
        />
        <h1 className="hidden text-lg font-bold text-foreground sm:block">{config.appTitle}</h1>
        <SearchBar value={filters.keyword} onChange={setFilter.keyword} />
        <AddTaskButton onAdd={handleOpenModal} disabled={isLoading} />
      </header>

      <section {...aria.filters}>
        <TaskFilters
          filters={filters}
          categoryOptions={categoryOptions}
          priorityOptions={priorityOptions}
          onCategoryChange={setFilter.category}
          onPriorityChange={setFilter.priority}
          onCompletionChange={setFilter.completion}
          onDateChange={setFilter.date}
          onReset={setFilter.reset}
        />
      </section>

      <main {...aria.main} className="flex w-full flex-1 flex-col overflow-y-auto">
        {isLoading ? (
          <p className="py-8 text-center text-sm text-gray-500">Loading tasks…</p>
        ) : (
          <TaskList
            tasks={visibleTasks}
            totalCount={tasks.length}
            today={today()}
            onEdit={handleEdit}
            onToggle={toggleTask}
            onDelete={deleteTask}
          />
        )}
      </main>

      <footer {...aria.footer} className="pt-2 text-center text-[10px] text-gray-500 sm:pt-4 sm:text-xs">
        Showing {visibleTasks.length} of {tasks.length} tasks
      </footer>

      <TaskModal
        isOpen={isModalOpen}
        onClose={handleCloseModal}
        onSave={handleSave}
        task={editing}
        categorySuggestions={categoryOptions.slice(1)}
      />
      <AboutDialog isOpen={isAboutOpen} onClose={() => setIsAboutOpen(false)} />
    </div>
  );
}
