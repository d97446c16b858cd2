/**
 * BatchRunner - runs commands in pool-sized waves
 *
 * Each wave is awaited in full before the next one starts, so a batch never
 * competes with itself for pool slots. Output order matches input order.
 */

import { v4 as uuidv4 } from 'uuid';
import { InternalExecutionError } from '../shared/utils/errors.js';
import type { Logger } from '../shared/utils/logger.js';
import type { CommandResult, ExecutionOptions } from './types.js';
import type { Executor } from './Executor.js';
import { buildFailure } from './results.js';

export interface BatchOptions extends Omit<ExecutionOptions, 'correlationId'> {
  /**
   * Commands per wave (default: the pool's maximum)
   */
  waveSize?: number;
}

export class BatchRunner {
  constructor(
    private readonly executor: Executor,
    private readonly defaultWaveSize: number,
    private readonly logger?: Logger
  ) {}

  async runBatch(
    commands: readonly string[],
    options: BatchOptions = {}
  ): Promise<readonly CommandResult[]> {
    const { waveSize = this.defaultWaveSize, ...runOptions } = options;
    const size = Math.max(1, Math.floor(waveSize));
    const batchId = uuidv4();
    const results: CommandResult[] = [];

    this.logger?.record(
      'debug',
      'Batch started',
      { commands: commands.length, waveSize: size },
      'BatchRunner',
      batchId
    );

    for (let start = 0; start < commands.length; start += size) {
      const wave = commands.slice(start, start + size);
      const settled = await Promise.allSettled(
        wave.map((command) => this.executor.run(command, runOptions))
      );

      settled.forEach((outcome, offset) => {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
          return;
        }
        const command = wave[offset] ?? '';
        const error = new InternalExecutionError(command, outcome.reason);
        this.logger?.record(
          'error',
          'Batch item failed unexpectedly',
          { command, error: error.message },
          'BatchRunner',
          batchId
        );
        results.push(
          buildFailure(
            { command, originalCommand: command, correlationId: uuidv4(), duration: 0 },
            error
          )
        );
      });
    }

    return Object.freeze(results);
  }
}
