import { z } from 'zod';
import { JsonObjectSchema, openEnum } from './common.js';

export const TRIGGER_TYPES = ['block', 'transaction', 'periodic', 'webhook', 'alert'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const ACTION_STATUSES = ['active', 'stopped', 'error'] as const;
export const EXECUTION_STATUSES = ['pending', 'running', 'success', 'failed'] as const;

export const ACTION_RUNTIMES = ['v1', 'v2'] as const;
export type ActionRuntime = (typeof ACTION_RUNTIMES)[number];

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type ActionTrigger =
  | { type: 'block'; block: { network: string[]; blocks: number } }
  | { type: 'transaction'; transaction: { status: Array<'mined' | 'confirmed'>; filters: Record<string, unknown>[] } }
  | { type: 'periodic'; periodic: { interval?: string; cron?: string } }
  | { type: 'webhook'; webhook: { authenticated: boolean } }
  | { type: 'alert'; alert: { alert_id: string } };

export interface CreateActionRequest {
  name: string;
  description?: string;
  runtime: ActionRuntime;
  function_name: string;
  source: string;
  trigger: ActionTrigger;
}

export type UpdateActionRequest = Partial<CreateActionRequest>;

export interface ListExecutionsParams {
  page?: number;
  perPage?: number;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const ActionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  runtime: z.string().nullish(),
  function_name: z.string().nullish(),
  status: openEnum(ACTION_STATUSES).nullish(),
  trigger: z.object({ type: openEnum(TRIGGER_TYPES) }).passthrough().nullish(),
  created_at: z.string().nullish(),
});
export type Action = z.infer<typeof ActionSchema>;

export const ActionListResponseSchema = z.object({
  actions: z.array(ActionSchema).default([]),
});

export const ExecutionSchema = z.object({
  id: z.string(),
  action_id: z.string().nullish(),
  status: openEnum(EXECUTION_STATUSES).nullish(),
  started_at: z.string().nullish(),
  ended_at: z.string().nullish(),
  error: z.string().nullish(),
  logs: z.array(JsonObjectSchema).nullish(),
});
export type Execution = z.infer<typeof ExecutionSchema>;

export const ExecutionListResponseSchema = z.object({
  executions: z.array(ExecutionSchema).default([]),
});

export const InvokeActionResponseSchema = z.object({
  execution_id: z.string(),
});
export type InvokeActionResponse = z.infer<typeof InvokeActionResponseSchema>;
