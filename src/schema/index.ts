import { z } from 'zod';

export const StatusSchema = z.enum(['Todo', 'Completed']);
export type Status = z.infer<typeof StatusSchema>;

export const TodoItemSchema = z.object({
  status: StatusSchema,
  todo: z.string(),
  info: z.string(),
});
export type TodoItem = z.infer<typeof TodoItemSchema>;

export const TodoFileSchema = z.array(TodoItemSchema);
