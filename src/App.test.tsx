import type { ReactNode } from 'react';
import { render, screen, fireEvent, within } from '@testing-library/react';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Task } from '@modules/types';
import { defaultFilters } from '@modules/filters';
import App from './App';
import { aria } from './aria';

const hook = vi.hoisted(() => ({
  addTask: vi.fn(),
  editTask: vi.fn(),
  toggleTask: vi.fn(),
  deleteTask: vi.fn(),
  clearCompleted: vi.fn(),
  clearOverdue: vi.fn(),
  refreshView: vi.fn(),
  setKeyword: vi.fn(),
  setCategory: vi.fn(),
}));

const tasks: Task[] = [
  { id: '1', name: 'Water plants', category: 'Home', completed: false },
  { id: '2', name: 'Send invoice', category: 'Work', completed: true },
];

vi.mock('./hooks', () => ({
  useTasks: () => ({
    tasks,
    visibleTasks: tasks.slice(0, 1),
    filters: defaultFilters,
    categoryOptions: ['All Categories', 'Home', 'Work'],
    priorityOptions: ['All Priorities'],
    isLoading: false,
    addTask: hook.addTask,
    updateTask: vi.fn(),
    editTask: hook.editTask,
    toggleTask: hook.toggleTask,
    deleteTask: hook.deleteTask,
    clearCompleted: hook.clearCompleted,
    clearOverdue: hook.clearOverdue,
    refreshView: hook.refreshView,
    setFilter: {
      category: hook.setCategory,
      priority: vi.fn(),
      completion: vi.fn(),
      date: vi.fn(),
      keyword: hook.setKeyword,
      reset: vi.fn(),
    },
  }),
}));

vi.mock('@headlessui/react', () => {
  const Passthrough = ({ children }: { children?: ReactNode }) => <>{children}</>;
  const Menu = Object.assign(
    ({ children }: { children?: ReactNode }) => <div>{children}</div>,
    {
      Button: ({ children, ...props }: { children?: ReactNode; 'aria-label'?: string }) => (
        <button type="button" {...props}>
          {children}
        </button>
      ),
      Items: Passthrough,
      Item: ({ children }: { children: (bag: { active: boolean }) => ReactNode }) => (
        <>{children({ active: false })}</>
      ),
    }
  );
  const Dialog = Object.assign(
    ({ children }: { children?: ReactNode }) => <div role="dialog">{children}</div>,
    {
      Panel: Passthrough,
      Title: ({ children }: { children?: ReactNode }) => <h2>{children}</h2>,
    }
  );
  const Transition = Object.assign(
    ({ show, children }: { show?: boolean; children?: ReactNode }) =>
      show === false ? null : <>{children}</>,
    { Child: Passthrough }
  );
  return { Menu, Dialog, Transition };
});

describe('App', () => {
  beforeEach(() => {
    Object.values(hook).forEach((fn) => fn.mockReset());
  });

  it('renders the application layout', () => {
    render(<App />);
    expect(screen.getByRole('banner', { name: aria.header['aria-label'] })).toBeTruthy();
    expect(screen.getByRole('main', { name: aria.main['aria-label'] })).toBeTruthy();
    expect(
      screen.getByRole('contentinfo', { name: aria.footer['aria-label'] }).textContent
    ).toBe('Showing 1 of 2 tasks');
  });

  it('shows only the filtered tasks', () => {
    render(<App />);
    const main = screen.getByRole('main', { name: aria.main['aria-label'] });
    expect(within(main).getByText('Water plants')).toBeTruthy();
    expect(within(main).queryByText('Send invoice')).toBeNull();
  });

  it('wires the search field and filters to the task state', () => {
    render(<App />);
    fireEvent.change(screen.getByRole('textbox', { name: 'Search tasks' }), {
      target: { value: 'urg' },
    });
    fireEvent.change(screen.getByRole('combobox', { name: 'Filter by category' }), {
      target: { value: 'Work' },
    });
    expect(hook.setKeyword).toHaveBeenCalledWith('urg');
    expect(hook.setCategory).toHaveBeenCalledWith('Work');
  });

  it('runs the clear commands from the menu', () => {
    render(<App />);
    fireEvent.click(screen.getByRole('button', { name: 'Clear Completed' }));
    fireEvent.click(screen.getByRole('button', { name: 'Clear Overdue' }));
    expect(hook.clearCompleted).toHaveBeenCalledTimes(1);
    expect(hook.clearOverdue).toHaveBeenCalledTimes(1);
  });

  it('adds a task and refreshes the view when the dialog closes', () => {
    render(<App />);
    fireEvent.click(screen.getByRole('button', { name: 'Add task' }));
    const dialog = screen.getByRole('dialog');
    fireEvent.change(within(dialog).getByLabelText(/^Name/), { target: { value: 'Book dentist' } });
    fireEvent.click(within(dialog).getByRole('button', { name: 'Save' }));
    expect(hook.addTask).toHaveBeenCalledWith({ name: 'Book dentist', completed: false });
    expect(hook.refreshView).toHaveBeenCalledTimes(1);
  });

  it('edits the task picked from the list', () => {
    render(<App />);
    fireEvent.click(screen.getByRole('button', { name: 'Edit Water plants' }));
    const dialog = screen.getByRole('dialog');
    expect(within(dialog).getByText('Edit Task')).toBeTruthy();
    fireEvent.click(within(dialog).getByRole('button', { name: 'Save' }));
    expect(hook.editTask).toHaveBeenCalledWith('1', {
      name: 'Water plants',
      category: 'Home',
      completed: false,
    });
    expect(hook.refreshView).toHaveBeenCalledTimes(1);
  });

  it('opens the about dialog', () => {
    render(<App />);
    fireEvent.click(screen.getByRole('button', { name: 'About' }));
    expect(screen.getByRole('heading', { name: "Need help? We're here." })).toBeTruthy();
  });
});
