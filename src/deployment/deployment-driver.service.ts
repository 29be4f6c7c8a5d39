import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { DeployConfig } from '../config/config.types';
import { COMPUTE_SERVICE } from '../fleet/fleet.tokens';
import type { ComputeService, DeploymentCommand, DeploymentStatus } from '../fleet/interfaces';
import { ROLLOUT_EVENTS } from '../progress/progress-events';
import type { DeployCompletedEvent, DeployStartedEvent } from '../progress/progress-events';
import { InvalidArgumentError } from '../shared/errors';
import { pollDone, pollPending, pollUntil } from '../shared/poll.utils';
import { DeployFailedError, DeployTimeoutError } from './deployment.errors';
import { DEPLOY_CONFIG } from './deployment.tokens';

/** Deploys the application and runs its migrations. */
export const DEPLOY_COMMAND: DeploymentCommand = {
  name: 'deploy',
  args: { migrate: ['true'] },
};

export interface DeploymentResult {
  deploymentId: string;
  status: 'successful';
}

@Injectable()
export class DeploymentDriverService {
  private readonly logger = new Logger(DeploymentDriverService.name);

  constructor(
    @Inject(COMPUTE_SERVICE) private readonly computeService: ComputeService,
    @Inject(DEPLOY_CONFIG) private readonly config: DeployConfig,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Runs the deploy command on exactly `instanceIds` and blocks until it succeeds.
   *
   * @param timeoutMs - Wall-clock budget; defaults to the configured deploy timeout
   * @throws {DeployFailedError} As soon as the deployment reports `failed`
   * @throws {DeployTimeoutError} If the deployment is still running when the budget is spent
   */
  async deploy(
    stackId: string,
    appId: string,
    instanceIds: readonly string[],
    timeoutMs: number = this.config.timeoutMs,
  ): Promise<DeploymentResult> {
    if (instanceIds.length === 0) {
      throw new InvalidArgumentError('Cannot deploy to an empty set of instances');
    }

    const handle = await this.computeService.createDeployment({
      stackId,
      appId,
      instanceIds: [...instanceIds],
      command: DEPLOY_COMMAND,
    });
    const startedAt = Date.now();

    this.logger.log(`Deployment ${handle.deploymentId} started for ${instanceIds.length} instance(s)`);
    this.eventEmitter.emit(ROLLOUT_EVENTS.DEPLOY_STARTED, {
      deploymentId: handle.deploymentId,
      appId,
      instanceIds: [...instanceIds],
    } satisfies DeployStartedEvent);

    const status = await pollUntil<DeploymentStatus>(
      async () => {
        const current = await this.computeService.pollDeployment(handle);
        if (current === 'failed') {
          throw new DeployFailedError(handle.deploymentId);
        }
        return current === 'successful' ? pollDone(current) : pollPending();
      },
      {
        intervalMs: this.config.pollIntervalMs,
        timeoutMs,
        onAttempt: (attempt, elapsedMs) => {
          this.logger.debug(`Deployment ${handle.deploymentId} still running (attempt ${attempt}, ${elapsedMs}ms)`);
        },
      },
    );

    if (status !== 'successful') {
      throw new DeployTimeoutError(handle.deploymentId, timeoutMs);
    }

    this.eventEmitter.emit(ROLLOUT_EVENTS.DEPLOY_COMPLETED, {
      deploymentId: handle.deploymentId,
      durationMs: Date.now() - startedAt,
    } satisfies DeployCompletedEvent);

    return { deploymentId: handle.deploymentId, status };
  }
}
