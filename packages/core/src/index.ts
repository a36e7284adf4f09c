/**
 * @watchpane/core
 *
 * Platform-free logic for the watchpane viewer: reload engine, change
 * batching, key navigation and viewport arithmetic.
 */

export type {
  Line,
  ContentBuffer,
  RenderCommand,
  RenderError,
  RenderResult,
  Renderer,
  ChangeNotification,
  ChangeEvent,
  NavigationCommand,
  KeySequenceState
} from './types'

export {
  RenderFailedError,
  RenderTerminatedError,
  RenderInvocationError,
  WatchSetupError,
  WatcherError,
  isRenderError
} from './errors'

export {
  TAB_WIDTH,
  decodeOutput,
  splitLines,
  stripTerminator,
  expandTabs,
  formatLineForDisplay
} from './content'

export { clampOffset, halfPage } from './viewport'

export { ReloadEngine, computeRepositionTarget } from './reload/ReloadEngine'
export type { ReloadEngineOptions, ReloadOutcome } from './reload/ReloadEngine'

export { KeyNavigator, KEY_BINDINGS, proposeOffset } from './navigation/KeyNavigator'
export type { ScrollPosition } from './navigation/KeyNavigator'

export { ChangeBatcher } from './watch/ChangeBatcher'
