/**
 * Trace event shape shared by every TraceSink.
 */

import { z } from 'zod';

export const TraceEventSchema = z.object({
  v: z.literal(1),
  type: z.string().min(1),
  ts: z.string(),
  run_id: z.string().optional(),
  step_id: z.string().optional(),
  data: z.record(z.unknown()),
});

export type TraceEvent = z.infer<typeof TraceEventSchema>;
