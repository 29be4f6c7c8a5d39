export * from './rollout-summary.interface';
export * from './rolling-deploy-request.interface';
