export const QUEUE_PREFIX = "queue:";

const NAMESPACE_PATTERN = /.*queue:/;

/**
 * Strip the namespace from a queue key: everything up to and including the
 * last `queue:` goes. Names without the marker are returned untouched.
 */
export function queueName(key: string): string {
    return key.replace(NAMESPACE_PATTERN, "");
}

/** Namespaced Redis list key for a bare or already-namespaced queue name. */
export function toQueueKey(name: string): string {
    return `${QUEUE_PREFIX}${queueName(name)}`;
}
