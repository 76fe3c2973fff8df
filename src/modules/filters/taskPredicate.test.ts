import { describe, it, expect } from 'vitest';
import type { Task } from '@modules/types';
import { buildTaskPredicate, defaultFilters, filterTasks } from '.';

const report: Task = {
  id: '1',
  name: 'Quarterly report',
  description: 'Urgent call with finance',
  category: 'Work',
  priority: 1,
  dueDate: '2024-06-01',
  completed: false
};
const groceries: Task = {
  id: '2',
  name: 'Groceries',
  category: 'home',
  priority: 3,
  completed: true
};
const plants: Task = { id: '3', name: 'Water plants', completed: false };

const tasks = [report, groceries, plants];

describe('buildTaskPredicate', () => {
  it('includes every task under the default filters', () => {
    expect(filterTasks(tasks, defaultFilters)).toEqual(tasks);
  });

  it('matches categories case-insensitively', () => {
    const matches = buildTaskPredicate({ ...defaultFilters, category: 'HOME' });
    expect(matches(groceries)).toBe(true);
    expect(matches(report)).toBe(false);
    expect(matches(plants)).toBe(false);
  });

  it('matches priorities by their text form', () => {
    const matches = buildTaskPredicate({ ...defaultFilters, priority: '3' });
    expect(filterTasks(tasks, { ...defaultFilters, priority: '3' })).toEqual([groceries]);
    expect(matches(plants)).toBe(false);
  });

  it('filters by completion status', () => {
    expect(filterTasks(tasks, { ...defaultFilters, completion: 'Completed' })).toEqual([groceries]);
    expect(filterTasks(tasks, { ...defaultFilters, completion: 'Not Completed' })).toEqual([
      report,
      plants
    ]);
    expect(filterTasks(tasks, { completion: undefined })).toEqual(tasks);
  });

  it('requires an exact due date when one is selected', () => {
    expect(filterTasks(tasks, { ...defaultFilters, date: '2024-06-01' })).toEqual([report]);
    expect(filterTasks(tasks, { ...defaultFilters, date: '2024-06-02' })).toEqual([]);
  });

  it('searches name, description and category ignoring case', () => {
    expect(filterTasks(tasks, { ...defaultFilters, keyword: 'urg' })).toEqual([report]);
    expect(filterTasks(tasks, { ...defaultFilters, keyword: 'PLANTS' })).toEqual([plants]);
    expect(filterTasks(tasks, { ...defaultFilters, keyword: 'Home' })).toEqual([groceries]);
    expect(filterTasks(tasks, { ...defaultFilters, keyword: 'dentist' })).toEqual([]);
  });

  it('searches the priority and due date text', () => {
    expect(filterTasks(tasks, { ...defaultFilters, keyword: '3' })).toEqual([groceries]);
    expect(filterTasks(tasks, { ...defaultFilters, keyword: '2024-06' })).toEqual([report]);
  });

  it('ignores a blank keyword', () => {
    expect(filterTasks(tasks, { ...defaultFilters, keyword: '   ' })).toEqual(tasks);
  });

  it('combines criteria conjunctively', () => {
    expect(
      filterTasks(tasks, { ...defaultFilters, category: 'work', keyword: 'groceries' })
    ).toEqual([]);
    expect(
      filterTasks(tasks, { ...defaultFilters, category: 'work', completion: 'Not Completed', keyword: 'report' })
    ).toEqual([report]);
  });

  it('never includes a missing task', () => {
    const matches = buildTaskPredicate(defaultFilters);
    expect(matches(null)).toBe(false);
    expect(matches(undefined)).toBe(false);
  });

  it('yields the same view when applied twice', () => {
    const criteria = { ...defaultFilters, completion: 'Not Completed' as const };
    expect(filterTasks(tasks, criteria)).toEqual(filterTasks(tasks, criteria));
  });
});
