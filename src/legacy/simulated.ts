// In-process stand-in for the legacy agent API

import { CollaboratorError } from '../errors';
import type { LegacyCollaborator, LegacyParams, LegacyResult } from '../types';

export const DEFAULT_STATUS_STRING = 'RUNNING|COMPLETED|FAILED';

export interface SimulatedLegacyOptions {
  statusString?: string;
  resultCode?: number;
  output?: (taskId: string, params: LegacyParams) => string;
  failOn?: {
    executeTask?: string;
    getStatus?: string;
  };
  now?: () => Date;
}

export type SimulatedCall =
  | { method: 'executeTask'; taskId: string; params: LegacyParams }
  | { method: 'getStatus'; taskId: string };

export class SimulatedLegacyApi implements LegacyCollaborator {
  readonly calls: SimulatedCall[] = [];
  private options: SimulatedLegacyOptions;

  constructor(options: SimulatedLegacyOptions = {}) {
    this.options = options;
  }

  executeTask(taskId: string, params: LegacyParams): LegacyResult {
    this.calls.push({ method: 'executeTask', taskId, params });

    const failure = this.options.failOn?.executeTask;
    if (failure !== undefined) {
      throw new CollaboratorError(failure);
    }

    const output = this.options.output
      ? this.options.output(taskId, params)
      : `Task ${taskId} executed with action ${params.action}`;

    return {
      status: 'completed',
      result_code: this.options.resultCode ?? 200,
      output,
      timestamp: (this.options.now ?? (() => new Date()))().toISOString()
    };
  }

  getStatus(taskId: string): string {
    this.calls.push({ method: 'getStatus', taskId });

    const failure = this.options.failOn?.getStatus;
    if (failure !== undefined) {
      throw new CollaboratorError(failure);
    }
    return this.options.statusString ?? DEFAULT_STATUS_STRING;
  }
}
