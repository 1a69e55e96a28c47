export * from './delivery-tracker';
export * from './event-processor';
