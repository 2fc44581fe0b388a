/**
 * Runtime Topic Names
 *
 * Canonical format: `runtime.<kind>.<producer>.<event-name>.v<version>`
 *
 *   kind:     evt | cmd
 *   producer: node name, lower-case, hyphenated
 */

export type TopicKind = 'evt' | 'cmd';

export interface TopicParts {
    readonly kind: TopicKind;
    readonly producer: string;
    readonly eventName: string;
    readonly version: number;
}

export const TOPIC_PATTERN = /^runtime\.(evt|cmd)\.([a-z0-9][a-z0-9-]*)\.([a-z0-9][a-z0-9-]*)\.v([1-9][0-9]*)$/;

/** `node_graph_reducer` -> `node-graph-reducer` */
export function toTopicSegment(name: string): string {
    return name
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export function buildTopic(kind: TopicKind, producer: string, eventName: string, version = 1): string {
    return `runtime.${kind}.${toTopicSegment(producer)}.${toTopicSegment(eventName)}.v${version}`;
}

export function parseTopic(topic: string): TopicParts | null {
    const match = TOPIC_PATTERN.exec(topic);
    if (!match) {
        return null;
    }
    const [, kind, producer, eventName, version] = match;
    if ((kind !== 'evt' && kind !== 'cmd') || !producer || !eventName || !version) {
        return null;
    }
    return { kind, producer, eventName, version: Number(version) };
}

export function isValidTopic(topic: string): boolean {
    return TOPIC_PATTERN.test(topic);
}

export function isCommandTopic(topic: string): boolean {
    return parseTopic(topic)?.kind === 'cmd';
}

export const RUNTIME_READY_TOPIC = buildTopic('evt', 'orchestrator', 'runtime-ready');
export const RUNTIME_STOPPED_TOPIC = buildTopic('evt', 'orchestrator', 'runtime-stopped');
