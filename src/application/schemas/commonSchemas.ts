import { z } from "zod";

export const taskIdSchema = z.number().int().positive().describe("The ID of the task.");
export const taskTextSchema = z.string().describe("Task text (surrounding whitespace is trimmed)");
export const taskFilterSchema = z.enum(['all', 'completed', 'incomplete']).describe("Which tasks to show");
