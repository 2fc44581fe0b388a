/**
 * Effects Library
 *
 * Default effect handlers and the collaborators they write to.
 */

export type { Alert, AlertSeverity, AlertSink } from './alertSink.js';
export { InMemoryAlertSink, LoggingAlertSink } from './alertSink.js';
export type { CapturedRecord, CaptureStore } from './captureStore.js';
export { InMemoryCaptureStore } from './captureStore.js';
export type { BusHandler, BusMessage, EventBus, PublishOptions, Subscription } from './eventBus.js';
export { InMemoryEventBus } from './eventBus.js';
export type { EffectCollaborators } from './handlers.js';
export { createEffectRegistry, resolveEventTopic } from './handlers.js';
export type { ReleasableHandle, ReleaseReport } from './resources.js';
export { ResourceRegistry } from './resources.js';
export type { SnapshotStore, StateSnapshotRecord } from './snapshotStore.js';
export { InMemorySnapshotStore, PgSnapshotStore } from './snapshotStore.js';
export type { TopicKind, TopicParts } from './topics.js';
export {
    buildTopic,
    isCommandTopic,
    isValidTopic,
    parseTopic,
    RUNTIME_READY_TOPIC,
    RUNTIME_STOPPED_TOPIC
} from './topics.js';
