// src/core/errors/formatter.ts

/* -------------------- Formatting helpers -------------------- */
import type { ErrorEnvelope } from '../types/errors';
import { isBigint, isNumber } from '../utils/number';

function elideMiddle(s: string, max = 96): string {
  if (s.length <= max) return s;
  const keep = Math.max(10, Math.floor((max - 1) / 2));
  return `${s.slice(0, keep)}…${s.slice(-keep)}`;
}

function shortJSON(v: unknown, max = 240): string {
  try {
    const s = JSON.stringify(v, (_k: string, val: unknown): unknown =>
      isBigint(val) ? `${val.toString()}n` : val,
    );
    return s.length > max ? elideMiddle(s, max) : s;
  } catch {
    return String(v);
  }
}

function scalar(v: unknown, max = 96): string {
  return typeof v === 'string' || isNumber(v) || isBigint(v) || typeof v === 'boolean'
    ? String(v)
    : shortJSON(v, max);
}

function kv(label: string, value: string): string {
  const width = 10;
  const pad = label.length >= width ? ' ' : ' '.repeat(width - label.length);
  return `${label + pad}: ${value}`;
}

// Byte accounting for short reads and size checks, field/topic position for decodes.
const CONTEXT_KEYS = ['expected', 'received', 'size', 'max', 'field', 'topicIndex'] as const;

function formatContextLine(ctx?: Record<string, unknown>): string | undefined {
  if (!ctx) return;
  const parts: string[] = [];
  for (const key of CONTEXT_KEYS) {
    const value = ctx[key];
    if (value !== undefined) parts.push(`${key}=${scalar(value, 48)}`);
  }
  return parts.length ? `  ${kv('Context', parts.join('  •  '))}` : undefined;
}

function formatEvent(ctx?: Record<string, unknown>): string | undefined {
  const event = ctx && typeof ctx['event'] === 'string' ? ctx['event'] : undefined;
  return event ? `  ${kv('Event', event)}` : undefined;
}

function formatCause(c?: unknown): string[] {
  if (!c) return [];
  const out: string[] = [];

  if (typeof c === 'object' && c !== null) {
    const obj = c as Record<string, unknown>;
    const head: string[] = [];
    if (obj.name !== undefined) head.push(`name=${scalar(obj.name, 120)}`);
    if (obj.code !== undefined) head.push(`code=${scalar(obj.code, 120)}`);
    if (head.length) out.push(`  ${kv('Cause', head.join('  '))}`);

    if (obj.message) {
      out.push(`              message=${elideMiddle(scalar(obj.message, 600), 600)}`);
    }
  } else {
    out.push(`  ${kv('Cause', shortJSON(c, 200))}`);
  }

  return out;
}

export function formatEnvelopePretty(e: ErrorEnvelope): string {
  const lines: string[] = [];

  // Header
  lines.push(`✖ BoundaryError [${e.type}]`);
  lines.push(`  ${kv('Message', e.message)}`);
  lines.push('');

  lines.push(`  ${kv('Operation', e.operation)}`);

  const ctxLine = formatContextLine(e.context);
  if (ctxLine) lines.push(ctxLine);

  const eventLine = formatEvent(e.context);
  if (eventLine) lines.push(eventLine);

  const causeLines = formatCause(e.cause);
  if (causeLines.length) {
    if (!ctxLine) lines.push('');
    lines.push(...causeLines);
  }

  return lines.join('\n');
}
