export const PRAXIS_VERSION = '0.1.0';
