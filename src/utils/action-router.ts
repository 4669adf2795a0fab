/**
 * Action Router - routing for consolidated MCP tools
 *
 * - Matches the `action` argument with fuzzy logic and aliases
 * - Parses the remaining arguments with the action's zod schema
 * - Runs the handler and reports failures as structured outcomes
 *
 * Usage:
 *   const router = createActionRouter({ actions: ACTIONS, definitions });
 *   const outcome = await router(args);
 */

import { z } from 'zod';
import {
    type GuidingError,
    type MatchResult,
    isGuidingError,
    matchAction
} from './fuzzy-enum.js';
import { getErrorMessage } from './logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type McpResponse = {
    content: Array<{ type: 'text'; text: string }>;
};

/** Structured data returned by an action handler */
export type ActionPayload = Record<string, unknown>;

export class ActionValidationError extends Error {
    constructor(readonly zodError: z.ZodError) {
        super('Invalid arguments');
        this.name = 'ActionValidationError';
    }
}

/**
 * A single action of a consolidated tool. Built with `defineAction` so the
 * schema and handler agree on the argument type.
 */
export interface ActionDefinition<TResult extends ActionPayload = ActionPayload> {
    execute: (args: unknown) => Promise<TResult>;
    aliases?: readonly string[];
    description?: string;
}

export interface ActionRouterConfig<TActions extends string, TResult extends ActionPayload> {
    actions: readonly TActions[];
    definitions: Record<TActions, ActionDefinition<TResult>>;
    /** Minimum similarity for fuzzy matching (default: 0.6) */
    threshold?: number;
}

export interface FuzzyMatchInfo {
    requested: string;
    resolved: string;
    /** Percentage, 0-100 */
    similarity: number;
}

export type RouteOutcome<TActions extends string, TResult extends ActionPayload> =
    | { kind: 'success'; action: TActions; result: TResult; fuzzyMatch?: FuzzyMatchInfo }
    | { kind: 'invalid_action'; guidance: GuidingError }
    | { kind: 'missing_action'; received: string; validActions: TActions[] }
    | { kind: 'validation_error'; action: TActions; error: z.ZodError }
    | { kind: 'handler_error'; action: TActions; message: string };

// ═══════════════════════════════════════════════════════════════════════════
// DEFINITION HELPER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * @example
 * const scale = defineAction(
 *     z.object({ archetypeId: z.string(), floor: z.number().int() }),
 *     args => ({ stats: service.computeScaledStats(args.archetypeId, args.floor) }),
 *     { aliases: ['stats_at'] }
 * );
 */
export function defineAction<TSchema extends z.ZodTypeAny, TResult extends ActionPayload>(
    schema: TSchema,
    handler: (args: z.output<TSchema>) => TResult | Promise<TResult>,
    meta: { aliases?: readonly string[]; description?: string } = {}
): ActionDefinition<TResult> {
    return {
        ...meta,
        async execute(args: unknown): Promise<TResult> {
            const parsed = schema.safeParse(args);
            if (!parsed.success) {
                throw new ActionValidationError(parsed.error);
            }
            return handler(parsed.data);
        }
    };
}

export function buildAliasMap<TActions extends string, TResult extends ActionPayload>(
    definitions: Record<TActions, ActionDefinition<TResult>>,
    actions: readonly TActions[]
): Record<string, TActions> {
    const aliasMap: Record<string, TActions> = {};
    for (const action of actions) {
        for (const alias of definitions[action].aliases ?? []) {
            aliasMap[alias.toLowerCase()] = action;
        }
    }
    return aliasMap;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION ROUTER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createActionRouter<TActions extends string, TResult extends ActionPayload>(
    config: ActionRouterConfig<TActions, TResult>
): (args: Record<string, unknown>) => Promise<RouteOutcome<TActions, TResult>> {
    const { actions, definitions, threshold = 0.6 } = config;
    const aliasMap = buildAliasMap(definitions, actions);

    return async function route(args: Record<string, unknown>): Promise<RouteOutcome<TActions, TResult>> {
        const rawAction = args.action;
        if (typeof rawAction !== 'string') {
            return { kind: 'missing_action', received: typeof rawAction, validActions: [...actions] };
        }

        const match: MatchResult<TActions> | GuidingError = matchAction(rawAction, actions, aliasMap, threshold);
        if (isGuidingError(match)) {
            return { kind: 'invalid_action', guidance: match };
        }

        const action = match.matched;
        try {
            const result = await definitions[action].execute(args);
            const fuzzyMatch = match.exact
                ? undefined
                : { requested: rawAction, resolved: action, similarity: Math.round(match.similarity * 100) };
            return { kind: 'success', action, result, fuzzyMatch };
        } catch (error) {
            if (error instanceof ActionValidationError) {
                return { kind: 'validation_error', action, error: error.zodError };
            }
            return { kind: 'handler_error', action, message: getErrorMessage(error) };
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatMcpText(text: string): McpResponse {
    return { content: [{ type: 'text', text }] };
}

/**
 * JSON body for a failed route; null for a success
 */
export function describeRouteFailure<TActions extends string, TResult extends ActionPayload>(
    outcome: RouteOutcome<TActions, TResult>
): ActionPayload | null {
    switch (outcome.kind) {
        case 'success':
            return null;
        case 'missing_action':
            return {
                error: 'missing_action',
                message: 'Missing or invalid "action" parameter',
                received: outcome.received,
                validActions: outcome.validActions
            };
        case 'invalid_action':
            return {
                error: outcome.guidance.error,
                message: outcome.guidance.message,
                input: outcome.guidance.input,
                suggestions: outcome.guidance.suggestions
            };
        case 'validation_error':
            return {
                error: 'validation_error',
                action: outcome.action,
                message: `Validation failed for action "${outcome.action}"`,
                issues: formatZodIssues(outcome.error)
            };
        case 'handler_error':
            return {
                error: 'handler_error',
                action: outcome.action,
                message: outcome.message
            };
    }
}

export function formatZodIssues(error: z.ZodError): Array<{ path: string; message: string; code: string }> {
    return error.issues.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
        code: issue.code
    }));
}

/**
 * Text for the `action` parameter: every action, then its aliases
 */
export function buildActionDescription<TActions extends string, TResult extends ActionPayload>(
    actions: readonly TActions[],
    definitions: Record<TActions, ActionDefinition<TResult>>
): string {
    const parts = [`Action to perform: ${actions.join(', ')}`];

    const aliasLines = actions
        .filter(action => (definitions[action].aliases ?? []).length > 0)
        .map(action => `${(definitions[action].aliases ?? []).join('/')} -> ${action}`);

    if (aliasLines.length > 0) {
        parts.push(`Aliases: ${aliasLines.join(', ')}`);
    }

    return parts.join('. ');
}
