export const FLEET_CONFIG = 'FLEET_CONFIG';
export const COMPUTE_SERVICE = 'COMPUTE_SERVICE';
export const LOAD_BALANCER_SERVICE = 'LOAD_BALANCER_SERVICE';
