export * from './instance.interface';
export * from './load-balancer.interface';
export * from './compute-service.interface';
export * from './load-balancer-service.interface';
