export * from './standards.js';
export * from './logging/json-log.js';
export * from './messaging/ids.js';
export * from './messaging/bucket-notification.js';
