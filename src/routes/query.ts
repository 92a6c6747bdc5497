import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { QueryAgent } from '../agents/queryAgent';
import { ApiError, asyncHandler } from '../middleware/errorHandler';
import { componentLogger } from '../config/logger';

const log = componentLogger('query-route');

const chatTurnSchema = z.object({
  question: z.string().default(''),
  answer: z.string().default('')
});

const reconRequestSchema = z.object({
  chat_input: z.string({ required_error: 'Please provide a valid question in the request body' })
    .trim()
    .min(1, 'Please provide a valid question in the request body'),
  chat_history: z.array(chatTurnSchema).default([]),
  user_name: z.string().trim().optional()
});

export type ReconRequest = z.infer<typeof reconRequestSchema>;

export interface ReconResponse {
  chat_output: string;
  csv_url: string | null;
}

/**
 * POST /recon_agent
 * Body: {
 *   chat_input: string,
 *   chat_history?: { question: string, answer: string }[],
 *   user_name?: string
 * }
 */
export function createQueryRouter(agent: QueryAgent): Router {
  const router = Router();

  router.post('/recon_agent', asyncHandler(async (req: Request, res: Response) => {
    const parsed = reconRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ApiError(
        400,
        parsed.error.issues[0]?.message ?? 'Invalid request body',
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        'VALIDATION_ERROR'
      );
    }

    const { chat_input, chat_history, user_name }: ReconRequest = parsed.data;
    log.info('Received question', { userName: user_name || undefined, historyLength: chat_history.length });

    const response = await agent.handle({
      text: chat_input,
      chatHistory: chat_history,
      userName: user_name || undefined
    });

    const body: ReconResponse = {
      chat_output: response.text,
      csv_url: response.artifact?.url ?? null
    };
    res.json(body);
  }));

  return router;
}
