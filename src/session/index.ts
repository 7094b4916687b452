export * from './types';
export * from './sessionStateMachine';
