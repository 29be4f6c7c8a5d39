import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import type { LockConfig } from '../config/config.types';
import { DeploymentDriverService } from '../deployment/deployment-driver.service';
import { COMPUTE_SERVICE } from '../fleet/fleet.tokens';
import { ONLINE_STATUS } from '../fleet/interfaces';
import type { ComputeService, Instance } from '../fleet/interfaces';
import { LoadBalancerManagerService } from '../load-balancer/load-balancer-manager.service';
import { DistributedLockService } from '../lock/distributed-lock.service';
import { LOCK_CONFIG } from '../lock/lock.tokens';
import { ROLLOUT_EVENTS } from '../progress/progress-events';
import type { BatchEvent, RolloutCompletedEvent } from '../progress/progress-events';
import { getErrorMessage } from '../shared/error.utils';
import { InvalidArgumentError } from '../shared/errors';
import { RollingDeployRequestDto } from './dto/rolling-deploy-request.dto';
import { batchInstances } from './instance-batcher';
import type { BatchReport, RollingDeployRequest, RolloutSummary } from './interfaces';

/**
 * Top-level rollout state machine.
 *
 * Under the cluster-wide deploy lock, deploys the online instances of a
 * layer batch by batch: each batch is drained from its load balancers,
 * deployed, then put back. Batches run strictly one after another and the
 * first failing batch stops the rollout.
 *
 * @remarks
 * - Reattaching runs whenever detach returned, including after a failed deploy
 * - When both deploy and reattach fail, the deploy error is surfaced and the
 *   reattach error is logged
 * - The lock is released on every exit path by {@link DistributedLockService}
 */
@Injectable()
export class RollingDeployService {
  private readonly logger = new Logger(RollingDeployService.name);

  constructor(
    private readonly lockService: DistributedLockService,
    private readonly loadBalancerManager: LoadBalancerManagerService,
    private readonly deploymentDriver: DeploymentDriverService,
    @Inject(COMPUTE_SERVICE) private readonly computeService: ComputeService,
    @Inject(LOCK_CONFIG) private readonly lockConfig: LockConfig,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Runs one rolling deploy.
   *
   * @returns A summary with one report per completed batch
   * @throws {InvalidArgumentError} If the request is malformed; nothing was touched
   * @throws {LockTimeoutError} If another rollout held the lock for the whole wait window
   * @throws The first batch failure, after its instances were reattached
   */
  async rollingDeploy(request: RollingDeployRequest): Promise<RolloutSummary> {
    const validated = await this.validateRequest(request);

    return this.lockService.withLock(this.lockConfig.name, this.lockConfig.maxWaitMs, () =>
      this.runBatches(validated),
    );
  }

  private async runBatches(request: RollingDeployRequestDto): Promise<RolloutSummary> {
    const instances = await this.computeService.listInstances(request.layerId);
    const eligible = instances.filter((instance) => instance.status === ONLINE_STATUS);

    if (eligible.length === 0) {
      this.logger.warn(`No online instances in layer ${request.layerId}; nothing to deploy`);
    } else if (eligible.length < instances.length) {
      this.logger.log(`Skipping ${instances.length - eligible.length} instance(s) that are not online`);
    }

    const batches = batchInstances(eligible, request.percent);
    const reports: BatchReport[] = [];

    for (const [position, batch] of batches.entries()) {
      reports.push(await this.runBatch(request, batch, position + 1, batches.length));
    }

    const summary: RolloutSummary = {
      stackId: request.stackId,
      layerId: request.layerId,
      appId: request.appId,
      eligibleInstances: eligible.length,
      batches: reports,
    };
    this.eventEmitter.emit(ROLLOUT_EVENTS.ROLLOUT_COMPLETED, { summary } satisfies RolloutCompletedEvent);
    return summary;
  }

  private async runBatch(
    request: RollingDeployRequestDto,
    batch: Instance[],
    index: number,
    total: number,
  ): Promise<BatchReport> {
    const hostnames = batch.map((instance) => instance.hostname);
    const batchEvent: BatchEvent = { index, total, hostnames };
    this.eventEmitter.emit(ROLLOUT_EVENTS.BATCH_STARTED, batchEvent);

    const detached = await this.loadBalancerManager.detach(batch);

    let deploymentId: string;
    try {
      const result = await this.deploymentDriver.deploy(
        request.stackId,
        request.appId,
        batch.map((instance) => instance.instanceId),
      );
      deploymentId = result.deploymentId;
    } catch (deployError) {
      this.logger.error(
        `Batch ${index}/${total} (${hostnames.join(', ')}) failed to deploy: ` +
          `${this.describeError(deployError)}; reattaching before aborting`,
      );
      try {
        await this.loadBalancerManager.attach(batch, detached);
      } catch (attachError) {
        this.logger.error(
          `Batch ${index}/${total} (${hostnames.join(', ')}) could not be reattached: ${this.describeError(attachError)}`,
        );
      }
      throw deployError;
    }

    await this.loadBalancerManager.attach(batch, detached);

    this.eventEmitter.emit(ROLLOUT_EVENTS.BATCH_DONE, batchEvent);
    return {
      index,
      hostnames,
      loadBalancers: detached.map((loadBalancer) => loadBalancer.name),
      deploymentId,
    };
  }

  private async validateRequest(request: RollingDeployRequest): Promise<RollingDeployRequestDto> {
    const dto = plainToInstance(RollingDeployRequestDto, request);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new InvalidArgumentError(`Invalid rolling deploy request: ${messages.join('; ')}`);
    }
    return dto;
  }

  private describeError(error: unknown): string {
    const kind = error instanceof Error ? error.name : typeof error;
    return `${kind}: ${getErrorMessage(error)}`;
  }
}
