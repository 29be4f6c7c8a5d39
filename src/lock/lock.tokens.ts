export const LOCK_CONFIG = 'LOCK_CONFIG';
export const LOCK_BACKEND = 'LOCK_BACKEND';
