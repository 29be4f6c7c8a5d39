import { readFileSync } from 'fs';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { FleetConfig } from '../../config/config.types';
import { InvalidArgumentError } from '../../shared/errors';
import { isInstance, isLoadBalancer, isRecord } from '../fleet.guards';
import { FLEET_CONFIG } from '../fleet.tokens';
import type {
  ComputeService,
  DeploymentHandle,
  DeploymentRequest,
  DeploymentStatus,
  Instance,
  LoadBalancer,
  LoadBalancerInstanceState,
  LoadBalancerService,
  RegistrationResult,
} from '../interfaces';

export interface SimulatedFleetSeed {
  layers: Record<string, Instance[]>;
  loadBalancers: LoadBalancer[];
}

/** `hang` keeps a deployment running forever. */
export type SimulatedDeploymentOutcome = 'successful' | 'failed' | 'hang';

interface PendingTransition {
  settled: LoadBalancerInstanceState;
  pollsLeft: number;
}

interface SimulatedDeployment {
  request: DeploymentRequest;
  outcome: SimulatedDeploymentOutcome;
  pollsLeft: number;
}

/**
 * In-process stand-in for both fleet services.
 *
 * State changes are accepted immediately but only become visible through
 * polling after `settlePolls` polls, the way the real services converge.
 * Deregistered targets report `in-service` while draining, registered ones
 * report `out-of-service` until healthy.
 */
@Injectable()
export class SimulatedFleetService implements ComputeService, LoadBalancerService {
  private readonly logger = new Logger(SimulatedFleetService.name);
  private readonly layers = new Map<string, Instance[]>();
  private readonly attachments = new Map<string, string[]>();
  private readonly transitions = new Map<string, PendingTransition>();
  private readonly deployments = new Map<string, SimulatedDeployment>();
  private readonly outcomes: SimulatedDeploymentOutcome[] = [];
  private readonly settlePolls: number;
  private deploymentCounter = 0;

  constructor(@Inject(FLEET_CONFIG) config: FleetConfig) {
    this.settlePolls = config.simulated.settlePolls;
    if (config.simulated.seedPath) {
      this.seed(SimulatedFleetService.readSeed(config.simulated.seedPath));
    }
  }

  /**
   * Reads and validates a seed file.
   *
   * @throws {InvalidArgumentError} If the file does not describe layers and load balancers
   */
  static readSeed(path: string): SimulatedFleetSeed {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));

    if (!isRecord(parsed) || !isRecord(parsed.layers) || !Array.isArray(parsed.loadBalancers)) {
      throw new InvalidArgumentError(`Simulated fleet seed ${path} must contain "layers" and "loadBalancers"`);
    }

    const layers: Record<string, Instance[]> = {};
    for (const [layerId, instances] of Object.entries(parsed.layers)) {
      if (!Array.isArray(instances) || !instances.every(isInstance)) {
        throw new InvalidArgumentError(`Simulated fleet seed ${path} has invalid instances for layer "${layerId}"`);
      }
      layers[layerId] = instances;
    }

    const loadBalancers = parsed.loadBalancers;
    if (!loadBalancers.every(isLoadBalancer)) {
      throw new InvalidArgumentError(`Simulated fleet seed ${path} has an invalid load balancer`);
    }

    return { layers, loadBalancers };
  }

  /** Replaces the whole fleet state. */
  seed(seed: SimulatedFleetSeed): void {
    this.layers.clear();
    this.attachments.clear();
    this.transitions.clear();
    this.deployments.clear();
    this.outcomes.length = 0;

    for (const [layerId, instances] of Object.entries(seed.layers)) {
      this.layers.set(
        layerId,
        instances.map((instance) => ({ ...instance })),
      );
    }
    for (const loadBalancer of seed.loadBalancers) {
      this.attachments.set(loadBalancer.name, [...loadBalancer.instanceIds]);
    }

    this.logger.log(`Simulated fleet seeded with ${this.layers.size} layer(s) and ${this.attachments.size} load balancer(s)`);
  }

  /** Decides how the next created deployment ends; unscripted deployments succeed. */
  queueDeploymentOutcome(outcome: SimulatedDeploymentOutcome): void {
    this.outcomes.push(outcome);
  }

  /** Deployment requests received so far, oldest first. */
  listDeployments(): DeploymentRequest[] {
    return [...this.deployments.values()].map((deployment) => deployment.request);
  }

  async listInstances(layerId: string): Promise<Instance[]> {
    return (this.layers.get(layerId) ?? []).map((instance) => ({ ...instance }));
  }

  async createDeployment(request: DeploymentRequest): Promise<DeploymentHandle> {
    this.deploymentCounter += 1;
    const deploymentId = `deployment-${this.deploymentCounter}`;

    this.deployments.set(deploymentId, {
      request: { ...request, instanceIds: [...request.instanceIds] },
      outcome: this.outcomes.shift() ?? 'successful',
      pollsLeft: this.settlePolls,
    });

    return { deploymentId };
  }

  async pollDeployment(handle: DeploymentHandle): Promise<DeploymentStatus> {
    const deployment = this.deployments.get(handle.deploymentId);
    if (!deployment) {
      throw new InvalidArgumentError(`Unknown deployment "${handle.deploymentId}"`);
    }

    if (deployment.pollsLeft > 0 || deployment.outcome === 'hang') {
      deployment.pollsLeft = Math.max(0, deployment.pollsLeft - 1);
      return 'running';
    }
    return deployment.outcome;
  }

  async listLoadBalancers(): Promise<LoadBalancer[]> {
    return [...this.attachments.entries()].map(([name, instanceIds]) => ({ name, instanceIds: [...instanceIds] }));
  }

  async deregister(loadBalancerName: string, targetIds: string[]): Promise<string[]> {
    const attached = this.attachedTo(loadBalancerName);
    const remaining = attached.filter((targetId) => !targetIds.includes(targetId));
    this.attachments.set(loadBalancerName, remaining);

    for (const targetId of targetIds) {
      if (attached.includes(targetId)) {
        this.startTransition(loadBalancerName, targetId, 'out-of-service');
      }
    }
    return [...remaining];
  }

  async register(loadBalancerName: string, targetIds: string[]): Promise<RegistrationResult> {
    const attached = this.attachedTo(loadBalancerName);
    const added = targetIds.filter((targetId) => !attached.includes(targetId));
    const instanceIds = [...attached, ...added];
    this.attachments.set(loadBalancerName, instanceIds);

    for (const targetId of added) {
      this.startTransition(loadBalancerName, targetId, 'in-service');
    }
    return { loadBalancerName, instanceIds: [...instanceIds] };
  }

  async pollInstanceState(loadBalancerName: string, targetId: string): Promise<LoadBalancerInstanceState> {
    const attached = this.attachedTo(loadBalancerName);
    const key = this.transitionKey(loadBalancerName, targetId);
    const transition = this.transitions.get(key);

    if (transition) {
      if (transition.pollsLeft > 0) {
        transition.pollsLeft -= 1;
        // Still converging: report the state the target is leaving.
        return transition.settled === 'in-service' ? 'out-of-service' : 'in-service';
      }
      this.transitions.delete(key);
      return transition.settled;
    }

    return attached.includes(targetId) ? 'in-service' : 'not-registered';
  }

  private attachedTo(loadBalancerName: string): string[] {
    const attached = this.attachments.get(loadBalancerName);
    if (!attached) {
      throw new InvalidArgumentError(`Unknown load balancer "${loadBalancerName}"`);
    }
    return attached;
  }

  private startTransition(loadBalancerName: string, targetId: string, settled: LoadBalancerInstanceState): void {
    this.transitions.set(this.transitionKey(loadBalancerName, targetId), { settled, pollsLeft: this.settlePolls });
  }

  private transitionKey(loadBalancerName: string, targetId: string): string {
    return `${loadBalancerName}/${targetId}`;
  }
}
