export const SERVER_NAME = 'etp-assistant';
export const VERSION = '0.1.0';
