export * from './types.js';
export * from './webhook-utils.js';
export * from './google-calendar-adapter.js';
export * from './twilio-adapter.js';
export * from './twilio-voice-bridge.js';
export * from './smtp-email-adapter.js';
export * from './templates/calendar-event.js';
export * from './templates/email-templates.js';
export * from './templates/formatting.js';
export * from './templates/sms-templates.js';
