/**
 * Action Schemas
 *
 * Zod schemas for the structured actions an agent sends to the environment.
 */

import { z } from 'zod';
import { ActionError, ErrorCode } from '../shared/errors/index.js';

/** Semantic identifier from the latest observation */
const TargetSchema = z.string().min(1).describe('data-semantic-id of the element, from the latest observation');

const TabIdSchema = z.number().int().nonnegative().describe('Tab index, as listed in the observation tabs');

// ============================================================================
// Element actions
// ============================================================================

export const ClickActionSchema = z.object({
  action: z.literal('click'),
  target: TargetSchema,
});

export const TypeActionSchema = z.object({
  action: z.literal('type'),
  target: TargetSchema,
  text: z.string(),
  /** Press Enter after filling */
  enter: z.boolean().default(false),
});

export const HoverActionSchema = z.object({
  action: z.literal('hover'),
  target: TargetSchema,
});

export const SelectActionSchema = z.object({
  action: z.literal('select'),
  target: TargetSchema,
  /** Option value to select */
  value: z.string(),
});

export const ClearActionSchema = z.object({
  action: z.literal('clear'),
  target: TargetSchema,
});

export const KeyPressActionSchema = z.object({
  action: z.literal('key_press'),
  /** Key name, e.g. Enter, Escape, ArrowDown */
  key: z.string().min(1),
  /** Pressed on the page keyboard when omitted */
  target: TargetSchema.optional(),
});

// ============================================================================
// Navigation actions
// ============================================================================

export const GotoUrlActionSchema = z.object({
  action: z.literal('goto_url'),
  url: z.string().min(1),
});

export const BackActionSchema = z.object({ action: z.literal('back') });
export const ForwardActionSchema = z.object({ action: z.literal('forward') });
export const RefreshActionSchema = z.object({ action: z.literal('refresh') });

// ============================================================================
// Tab and episode actions
// ============================================================================

export const NewTabActionSchema = z.object({
  action: z.literal('new_tab'),
  url: z.string().min(1).optional(),
});

export const SwitchTabActionSchema = z.object({
  action: z.literal('switch_tab'),
  tab_id: TabIdSchema,
});

export const CloseTabActionSchema = z.object({
  action: z.literal('close_tab'),
  tab_id: TabIdSchema,
});

export const TerminateActionSchema = z.object({
  action: z.literal('terminate'),
  answer: z.string().default(''),
});

export const ActionRequestSchema = z.discriminatedUnion('action', [
  ClickActionSchema,
  TypeActionSchema,
  HoverActionSchema,
  SelectActionSchema,
  ClearActionSchema,
  KeyPressActionSchema,
  GotoUrlActionSchema,
  BackActionSchema,
  ForwardActionSchema,
  RefreshActionSchema,
  NewTabActionSchema,
  SwitchTabActionSchema,
  CloseTabActionSchema,
  TerminateActionSchema,
]);

export type ActionRequest = z.infer<typeof ActionRequestSchema>;
export type ActionName = ActionRequest['action'];

/**
 * Flat input shape for tool registration. Per-action requirements are
 * enforced by {@link parseActionRequest}.
 */
export const ActionRequestInputSchema = z.object({
  action: z.enum([
    'click',
    'type',
    'hover',
    'select',
    'clear',
    'key_press',
    'goto_url',
    'back',
    'forward',
    'refresh',
    'new_tab',
    'switch_tab',
    'close_tab',
    'terminate',
  ]),
  target: z.string().optional().describe('data-semantic-id of the element to act on'),
  text: z.string().optional().describe('Text to type (type)'),
  enter: z.boolean().optional().describe('Press Enter after typing (type)'),
  value: z.string().optional().describe('Option value (select)'),
  key: z.string().optional().describe('Key to press (key_press)'),
  url: z.string().optional().describe('URL (goto_url, new_tab)'),
  tab_id: z.number().int().optional().describe('Tab index (switch_tab, close_tab)'),
  answer: z.string().optional().describe('Final answer (terminate)'),
});

export type ActionRequestInput = z.infer<typeof ActionRequestInputSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an action given as a JSON string or as an already parsed value.
 *
 * @throws ActionError with INVALID_ACTION_JSON or INVALID_ACTION
 */
export function parseActionRequest(input: unknown): ActionRequest {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (error) {
      throw new ActionError(
        `Invalid JSON action format: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.INVALID_ACTION_JSON,
        { input }
      );
    }
  }

  const result = ActionRequestSchema.safeParse(raw);
  if (!result.success) {
    throw new ActionError(`Invalid action: ${formatIssues(result.error)}`, ErrorCode.INVALID_ACTION, {
      issues: result.error.issues.length,
    });
  }
  return result.data;
}
