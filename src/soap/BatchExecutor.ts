/**
 * Batch Executor
 *
 * Purpose: Run many SOAP calls, sequentially or through a bounded worker
 * pool, and return one outcome per input in input order.
 *
 * Key behaviors:
 * - Workers pull the next index from a shared counter and write into that
 *   index's slot, so completion order never affects result order
 * - A failed item never stops its siblings, unless stopOnError is set; then
 *   items not yet dispatched are cancelled
 * - On batch deadline expiry in-flight calls are aborted through their
 *   signal and every slot still empty becomes a Cancelled outcome
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { CancelledError, PreconditionError } from '../errors.js';
import { getLogger, registerComponent, type Logger } from '../logging/index.js';
import { failureResult, type ResponseResult } from './ResponseInterpreter.js';
import type { RequestSpec, SoapClient } from './SoapClient.js';

registerComponent('soap-batch', 'Batch execution');

export type BatchMode = 'sequential' | 'parallel';

export interface BatchSpec {
  readonly requests: readonly RequestSpec[];
  readonly mode: BatchMode;
  /** Parallel mode only; defaults to the configured worker count */
  readonly maxWorkers?: number;
  /** Whole-batch deadline in milliseconds */
  readonly deadlineMs?: number;
  readonly stopOnError?: boolean;
}

export interface BatchResult {
  readonly results: readonly ResponseResult[];
  readonly total: number;
  readonly succeeded: number;
  /** Includes cancelled items */
  readonly failed: number;
  readonly cancelled: number;
}

/**
 * Anything that can run one call; SoapClient in production.
 */
export type RequestRunner = Pick<SoapClient, 'send'>;

export interface BatchExecutorOptions {
  logger?: Logger;
}

/**
 * Check batch parameters before any request is sent.
 *
 * @throws PreconditionError
 */
export function assertBatchSpec(spec: BatchSpec): void {
  if (spec.requests.length === 0) {
    throw new PreconditionError('Batch must contain at least one request');
  }
  if (spec.maxWorkers !== undefined && (!Number.isInteger(spec.maxWorkers) || spec.maxWorkers < 1)) {
    throw new PreconditionError(`maxWorkers must be an integer of at least 1, got ${spec.maxWorkers}`);
  }
  if (spec.deadlineMs !== undefined && !(spec.deadlineMs > 0)) {
    throw new PreconditionError(`Batch deadline must be positive, got ${spec.deadlineMs}`);
  }
}

export class BatchExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly runner: RequestRunner,
    options: BatchExecutorOptions = {}
  ) {
    this.logger = options.logger ?? getLogger('soap-batch');
  }

  async run(spec: BatchSpec): Promise<BatchResult> {
    assertBatchSpec(spec);

    const total = spec.requests.length;
    const slots: (ResponseResult | undefined)[] = new Array<ResponseResult | undefined>(total).fill(undefined);
    const controller = new AbortController();
    let stopped = false;
    let next = 0;

    const workerCount =
      spec.mode === 'parallel' ? Math.min(spec.maxWorkers ?? getEngineConfig().maxWorkers, total) : 1;

    this.logger.info('Starting batch', { total, mode: spec.mode, workers: workerCount });

    const runItem = async (index: number): Promise<void> => {
      const request = spec.requests[index];
      if (!request) return;
      let result: ResponseResult;
      try {
        result = await this.runner.send(request, controller.signal);
      } catch (error) {
        result = failureResult(error);
      }
      // A deadline may already have filled this slot
      if (slots[index] === undefined && !controller.signal.aborted) {
        slots[index] = result;
      }
      if (!result.success && spec.stopOnError) {
        stopped = true;
      }
    };

    const worker = async (): Promise<void> => {
      while (!stopped && !controller.signal.aborted) {
        const index = next++;
        if (index >= total) return;
        await runItem(index);
      }
    };

    const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      if (spec.deadlineMs === undefined) return;
      deadlineTimer = setTimeout(() => {
        this.logger.warn('Batch deadline expired, cancelling pending requests', { deadlineMs: spec.deadlineMs });
        controller.abort();
        resolve();
      }, spec.deadlineMs);
    });

    try {
      await Promise.race([workers, deadline]);
    } finally {
      clearTimeout(deadlineTimer);
    }

    const reason = controller.signal.aborted
      ? 'Batch deadline expired before the request completed'
      : 'Not dispatched because an earlier request failed';
    const results = slots.map((slot) => slot ?? failureResult(new CancelledError(reason)));

    const succeeded = results.filter((r) => r.success).length;
    const cancelled = results.filter((r) => r.error?.kind === 'Cancelled').length;

    this.logger.info('Batch finished', { total, succeeded, failed: total - succeeded, cancelled });

    return Object.freeze({
      results: Object.freeze(results),
      total,
      succeeded,
      failed: total - succeeded,
      cancelled,
    });
  }
}
