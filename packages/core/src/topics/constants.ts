/**
 * Topic that matches every topic in its dimension, on the subscriber side and on the notifier side.
 */
export const WILDCARD = "*";
