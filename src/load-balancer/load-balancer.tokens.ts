export const LOAD_BALANCER_WAIT_CONFIG = 'LOAD_BALANCER_WAIT_CONFIG';
