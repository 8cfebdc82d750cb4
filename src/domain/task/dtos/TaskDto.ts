import type { Task, TaskStatistics } from '../entities/Task.js';

/**
 * Task Data Transfer Objects
 * Used for transferring task data between layers
 */

/**
 * Task as handed to API clients
 */
export interface TaskDto {
  id: number;
  text: string;
  completed: boolean;
  createdAt: string;
  createdAtDisplay: string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format an instant as a minute-resolution local timestamp (YYYY-MM-DD HH:mm)
 */
export function formatCreatedAt(createdAt: string): string {
  const date = new Date(createdAt);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function toTaskDto(task: Task): TaskDto {
  return {
    ...task,
    createdAtDisplay: formatCreatedAt(task.createdAt)
  };
}

/**
 * One line per task for text responses
 */
export function formatTaskLine(task: Task): string {
  return `- #${task.id} [${task.completed ? 'x' : ' '}] ${task.text} (created ${formatCreatedAt(task.createdAt)})`;
}

export function formatStatistics(stats: TaskStatistics): string {
  return `Total: ${stats.total} | Completed: ${stats.completed} | Pending: ${stats.pending}`;
}
