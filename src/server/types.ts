import { z } from 'zod';

export interface SessionContext {
    sessionId: string;
}

const SessionArgsSchema = z.object({
    sessionId: z.string().min(1).optional().default('default')
}).passthrough();

/**
 * Pull the session id out of raw tool arguments
 */
export function sessionFromArgs(args: unknown): SessionContext {
    const parsed = SessionArgsSchema.safeParse(args);
    return { sessionId: parsed.success ? parsed.data.sessionId : 'default' };
}
