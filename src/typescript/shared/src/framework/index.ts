import type { Logger } from 'winston';
import type { HttpFunction } from '@google-cloud/functions-framework';
import { loadConfig, loadLoggingConfig, loadSentryConfig, RelayConfig } from '../config';
import { captureException, flushSentry, initSentry } from '../infrastructure/sentry';
import { HttpError } from './errors';
import { createLogger } from './logger';
import { createServices, RelayServices } from './services';

export * from './errors';
export { serializeErrors, formatGcpEntry } from './logger';
export { ACTIVITY_EVENT_SOURCE, ACTIVITY_EVENT_TYPE, getFirestore } from './services';
export type { RelayServices } from './services';

/**
 * The parts of an HTTP request handlers read. Express requests from the
 * Functions Framework satisfy it, and so do the synthetic requests built for
 * Pub/Sub triggers.
 */
export interface FrameworkRequest {
  method: string;
  query: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

export interface FrameworkResponse {
  statusCode: number;
  headersSent: boolean;
  status(code: number): FrameworkResponse;
  send(body?: unknown): unknown;
  json(body?: unknown): unknown;
  set(field: string, value: string): unknown;
}

export interface FrameworkContext {
  config: RelayConfig;
  services: RelayServices;
  logger: Logger;
  executionId: string;
}

export type FrameworkHandler = (
  req: FrameworkRequest,
  res: FrameworkResponse,
  ctx: FrameworkContext
) => Promise<void>;

export interface CloudFunctionOptions {
  /** Tags the handler's log lines, e.g. `[strava-intake] ...` */
  component?: string;
}

/**
 * Cloud Events delivered by a Pub/Sub trigger; `data` is the push body
 * (`{ message, subscription }`).
 */
export interface TriggerEvent {
  id?: string;
  type?: string;
  data?: unknown;
}

// Configure Structured Logging
const logger = createLogger(loadLoggingConfig());

let config: RelayConfig | undefined;

function getConfig(): RelayConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

interface Invocation {
  executionId: string;
  serviceName: string;
  triggerType: 'http' | 'pubsub';
  preambleLogger: Logger;
}

function startInvocation(triggerType: Invocation['triggerType']): Invocation {
  const { serviceName } = loadLoggingConfig();
  const executionId = `${serviceName}-${Date.now()}`;

  initSentry({ ...loadSentryConfig(), serverName: serviceName }, logger);

  return {
    executionId,
    serviceName,
    triggerType,
    preambleLogger: logger.child({ executionId, component: 'framework' })
  };
}

async function invoke(
  handler: FrameworkHandler,
  req: FrameworkRequest,
  res: FrameworkResponse,
  invocation: Invocation,
  options?: CloudFunctionOptions
): Promise<void> {
  const { executionId, preambleLogger } = invocation;

  preambleLogger.debug('Incoming Request', {
    method: req.method,
    query: req.query,
    body: req.body,
    triggerType: invocation.triggerType
  });

  const relayConfig = getConfig();
  const ctxLogger = logger.child({ executionId, component: options?.component ?? 'context' });

  const ctx: FrameworkContext = {
    config: relayConfig,
    services: createServices(relayConfig, ctxLogger),
    logger: ctxLogger,
    executionId
  };

  await handler(req, res, ctx);
}

async function reportFailure(err: unknown, invocation: Invocation): Promise<void> {
  const { preambleLogger } = invocation;
  preambleLogger.error('Function failed', { error: err });

  captureException(err, {
    service: invocation.serviceName,
    execution_id: invocation.executionId,
    trigger_type: invocation.triggerType,
  }, preambleLogger);

  // Critical: Wait for Sentry to send the event before function terminates
  await flushSentry(2000, preambleLogger);
}

/**
 * Wraps a handler as an HTTP Cloud Function. Thrown errors are answered with
 * their HttpError status, or 500.
 */
export const createCloudFunction = (handler: FrameworkHandler, options?: CloudFunctionOptions): HttpFunction => {
  return async (req, res) => {
    const invocation = startInvocation('http');
    res.set('x-execution-id', invocation.executionId);

    try {
      await invoke(handler, req, res, invocation, options);
      invocation.preambleLogger.info('Function completed successfully', { status: res.statusCode });
    } catch (err) {
      await reportFailure(err, invocation);

      if (!res.headersSent) {
        if (err instanceof HttpError) {
          res.status(err.statusCode).send(err.message);
        } else {
          res.status(500).send('Internal Server Error');
        }
      }
    }
  };
};

/**
 * Wraps a handler as a Pub/Sub-triggered Cloud Function. The event's data is
 * presented to the handler as the body of a synthetic POST, the way a push
 * subscription would deliver it. Thrown errors are rethrown so the trigger
 * records the failure.
 */
export const createEventFunction = (handler: FrameworkHandler, options?: CloudFunctionOptions) => {
  return async (event: TriggerEvent): Promise<void> => {
    const invocation = startInvocation('pubsub');

    const req: FrameworkRequest = {
      method: 'POST',
      query: {},
      headers: {},
      body: event.data
    };

    // Response object for the handler to use without crashing
    const captured: { status: number; body?: unknown } = { status: 200 };
    const res: FrameworkResponse = {
      get statusCode() { return captured.status; },
      headersSent: false,
      status(code: number) {
        captured.status = code;
        return res;
      },
      send(body?: unknown) { captured.body = body; },
      json(body?: unknown) { captured.body = body; },
      set() { }
    };

    try {
      await invoke(handler, req, res, invocation, options);
    } catch (err) {
      await reportFailure(err, invocation);
      throw err;
    }

    if (captured.status >= 400) {
      // Handled failures are not retried
      invocation.preambleLogger.warn('Handler responded with an error status', captured);
    } else {
      invocation.preambleLogger.info('Function completed successfully', { status: captured.status });
    }
  };
};
