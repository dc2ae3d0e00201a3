import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const requestIdentifier = z.string().min(1).max(128);
const label = z.string().min(1);

/**
 * Fields every log line of a gateway request inherits. The request handler
 * opens the context with the ids and method; mount, caller and rule are
 * added as the pipeline resolves them.
 */
export const LogContextSchema = z
  .object({
    correlation_id: requestIdentifier.optional(),
    request_id: requestIdentifier.optional(),
    method: label.optional(),
    route: label.optional(),
    mount_id: label.optional(),
    caller_id: label.optional(),
    rule_id: label.optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const requestContext = new AsyncLocalStorage<LogContext>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  requestContext.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => requestContext.getStore();

/** Returns the updated context, or undefined when no request is in flight. */
export const setLogContextFields = (fields: LogContext): LogContext | undefined => {
  const current = requestContext.getStore();
  if (current) {
    Object.assign(current, LogContextSchema.parse(fields));
  }

  return current;
};
