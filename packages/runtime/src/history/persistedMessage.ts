import { z } from 'zod';
import {
  createChatMessage,
  type ChatMessage,
  type ChatRole,
  type JsonObject,
  type JsonValue
} from '@worksheetbot/core';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

export const PersistedHistorySchema = z.array(z.unknown(), {
  invalid_type_error: 'expected a JSON array of messages'
});

const PersistedRecordSchema = z.record(jsonValue, {
  invalid_type_error: 'expected a message object'
});

/**
 * `role` is the current field; `type: 'human' | 'ai'` is what older message
 * dumps wrote. Either one identifies the speaker.
 */
const KnownFieldsSchema = z
  .object({
    role: z.enum(['user', 'assistant']).optional(),
    type: z.enum(['human', 'ai']).optional(),
    content: z.string()
  })
  .refine((fields) => fields.role !== undefined || fields.type !== undefined, {
    message: 'missing role',
    path: ['role']
  });

export type DecodeResult =
  | { ok: true; message: ChatMessage }
  | { ok: false; reason: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

export function decodePersistedMessage(raw: unknown): DecodeResult {
  const record = PersistedRecordSchema.safeParse(raw);
  if (!record.success) {
    return { ok: false, reason: describeIssues(record.error) };
  }

  const known = KnownFieldsSchema.safeParse(record.data);
  if (!known.success) {
    return { ok: false, reason: describeIssues(known.error) };
  }

  const role: ChatRole = known.data.role ?? (known.data.type === 'human' ? 'user' : 'assistant');
  const extra: JsonObject = Object.fromEntries(
    Object.entries(record.data).filter(([key]) => key !== 'role' && key !== 'content')
  );

  return { ok: true, message: createChatMessage(role, known.data.content, extra) };
}
