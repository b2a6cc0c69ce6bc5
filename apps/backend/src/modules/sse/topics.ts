import type { StreamTopic, Topic } from '@nf-live/shared';
import { META_BATCH_LIMIT, STATE_BATCH_LIMIT, STREAM_BATCH_LIMIT } from '../../config/constants';

export const DEFAULT_TOPICS: readonly Topic[] = ['config', 'meta', 'state', 'nf', 'artifact', 'bandpower'];

/** Order in which the multiplexer drains buffers on each pass. */
export const DRAIN_ORDER: readonly StreamTopic[] = ['nf', 'artifact', 'bandpower', 'meta', 'state'];

const TOPIC_ALIASES: Record<string, Topic> = {
    config: 'config',
    meta: 'meta',
    state: 'state',
    nf: 'nf',
    artifact: 'artifact',
    art: 'artifact',
    artifact_gate: 'artifact',
    bandpower: 'bandpower',
    bp: 'bandpower',
    band: 'bandpower',
};

export const BATCH_LIMITS: Record<StreamTopic, number> = {
    nf: STREAM_BATCH_LIMIT,
    artifact: STREAM_BATCH_LIMIT,
    bandpower: STREAM_BATCH_LIMIT,
    meta: META_BATCH_LIMIT,
    state: STATE_BATCH_LIMIT,
};

export function resolveTopic(raw: string): Topic | null {
    const key = raw.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(TOPIC_ALIASES, key) ? TOPIC_ALIASES[key] : null;
}

/**
 * Parses a comma list of topic names, keeping the requested order and dropping
 * unknown names and duplicates. An empty or fully unknown list means every topic.
 */
export function parseTopics(raw: string | undefined): Topic[] {
    const out: Topic[] = [];
    for (const part of (raw || '').split(',')) {
        const topic = resolveTopic(part);
        if (topic && !out.includes(topic)) {
            out.push(topic);
        }
    }
    return out.length > 0 ? out : [...DEFAULT_TOPICS];
}

export function isStreamTopic(topic: Topic): topic is StreamTopic {
    return topic !== 'config';
}
