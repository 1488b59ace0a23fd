import { z } from 'zod';

/** Request from the page that owns this worker */
export const executeRequestSchema = z.object({
  type: z.literal('execute'),
  id: z.string(),
  sql: z.string(),
});

export type ExecuteRequest = z.infer<typeof executeRequestSchema>;

export interface ExecuteResult {
  type: 'result';
  id: string;
  result: string;
}

export interface ExecuteError {
  type: 'error';
  id: string;
  error: string;
}

export type ExecuteReply = ExecuteResult | ExecuteError;
