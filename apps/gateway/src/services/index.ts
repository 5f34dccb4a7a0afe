export { HeartbeatService } from './heartbeat.service';
export { LeaderElector } from './leaderelector';
export { Poller } from './poller';
export { Reaper } from './reaper';
export { TaskService, toStatusView } from './task.service';
export { TaskDispatcher } from './task-dispatcher';
export { CallbackCorrelator, payloadHash, canonicalJson, callbackVariables } from './callback-correlator';
export { CallbackReconciler } from './callback-reconciler';
export type { HandlerOutcome, DispatcherOptions } from './task-dispatcher';
export type { ReceiveResult, ProcessOutcome } from './callback-correlator';
export type { SweepResult } from './callback-reconciler';
