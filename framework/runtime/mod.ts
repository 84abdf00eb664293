/**
 * Layer 0: Runtime & Execution Environment
 *
 * Process lifecycle: signal handling and ordered shutdown.
 */

export {
  Lifecycle,
  type LifecycleHook,
  type LifecycleOptions,
  type ShutdownSignal,
} from './lifecycle.ts';
