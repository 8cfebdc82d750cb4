import type { Task, TaskFilter, TaskStatistics } from '../entities/Task.js';

/**
 * Task Store
 * Owns the ordered task sequence and the id counter for one session.
 * Every operation is synchronous; blank text and unknown ids are no-ops.
 */
export class TaskStore {
  private taskList: Task[] = [];
  private counter = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Snapshot of all tasks in insertion order
   */
  get tasks(): Task[] {
    return this.taskList.map(task => ({ ...task }));
  }

  /**
   * Id the next created task will receive
   */
  get nextId(): number {
    return this.counter;
  }

  /**
   * Get a task by ID
   */
  getTaskById(id: number): Task | undefined {
    const task = this.taskList.find(t => t.id === id);
    return task ? { ...task } : undefined;
  }

  create(text: string): void {
    const trimmed = text.trim();
    if (!trimmed) {
      return;
    }

    this.taskList.push({
      id: this.counter,
      text: trimmed,
      completed: false,
      createdAt: this.now().toISOString()
    });
    this.counter += 1;
  }

  delete(id: number): void {
    this.taskList = this.taskList.filter(task => task.id !== id);
  }

  toggle(id: number): void {
    const task = this.taskList.find(t => t.id === id);
    if (task) {
      task.completed = !task.completed;
    }
  }

  /**
   * Replace the text of a task. Blank input keeps the existing text.
   */
  update(id: number, newText: string): void {
    const trimmed = newText.trim();
    if (!trimmed) {
      return;
    }

    const task = this.taskList.find(t => t.id === id);
    if (task) {
      task.text = trimmed;
    }
  }

  filtered(kind: TaskFilter): Task[] {
    switch (kind) {
      case 'completed':
        return this.tasks.filter(task => task.completed);
      case 'incomplete':
        return this.tasks.filter(task => !task.completed);
      case 'all':
        return this.tasks;
    }
  }

  statistics(): TaskStatistics {
    const total = this.taskList.length;
    const completed = this.taskList.filter(task => task.completed).length;

    return {
      total,
      completed,
      pending: total - completed
    };
  }

  markAllCompleted(): void {
    for (const task of this.taskList) {
      task.completed = true;
    }
  }

  /**
   * Remove every task. The id counter keeps its value.
   */
  deleteAll(): void {
    this.taskList = [];
  }
}
