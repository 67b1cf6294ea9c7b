// public api for @fanflow/sdk
// usage:
//   import { orchestrator, activity } from '@fanflow/sdk';
//   orchestrator('fan-out', async (ctx) => {
//       const tasks = [1, 2, 3].map(n => ctx.callActivity<number>('square', n));
//       return ctx.taskAll(tasks);
//   });

export * from './types';
export * from './history';
export * from './errors';
export * from './workflow';
export * from './replay';
export * from './utils/serialization';
