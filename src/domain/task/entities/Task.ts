/**
 * Task domain entities
 * These types represent the core domain objects of the task list
 */

/**
 * Views over the task sequence
 */
export type TaskFilter = 'all' | 'completed' | 'incomplete';

/**
 * A single to-do entry
 */
export interface Task {
  id: number;
  text: string;
  completed: boolean;
  createdAt: string; // ISO instant of creation
}

/**
 * Derived counts over the whole store
 */
export interface TaskStatistics {
  total: number;
  completed: number;
  pending: number;
}
