export * from './immediate-thread-marshaller';
export * from './queued-thread-marshaller';
