export * from './types';
export * from './memoryBus';
export * from './mqttBus';
