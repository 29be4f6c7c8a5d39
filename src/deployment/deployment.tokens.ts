export const DEPLOY_CONFIG = 'DEPLOY_CONFIG';
