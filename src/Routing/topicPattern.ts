/**
 * MQTT topic filter validation and matching.
 *
 * - `+` matches exactly one level
 * - `#` matches zero or more trailing levels and must be the last level
 *
 * Levels are separated by `/`.
 */

const LEVEL_SEPARATOR = '/';
const SINGLE_LEVEL_WILDCARD = '+';
const MULTI_LEVEL_WILDCARD = '#';

export type PatternValidationResult = { valid: true } | { valid: false; reason: string };

export function validatePattern(pattern: string): PatternValidationResult {
  if (pattern.length === 0) {
    return { valid: false, reason: 'Pattern must be a non-empty string' };
  }

  const levels = pattern.split(LEVEL_SEPARATOR);

  for (let i = 0; i < levels.length; i++) {
    const level = levels[i];

    if (level.length === 0) {
      return { valid: false, reason: 'Pattern contains an empty level' };
    }

    if (level === MULTI_LEVEL_WILDCARD) {
      if (i !== levels.length - 1) {
        return { valid: false, reason: '`#` wildcard must be the last level' };
      }
      continue;
    }

    if (level === SINGLE_LEVEL_WILDCARD) continue;

    if (level.includes(SINGLE_LEVEL_WILDCARD) || level.includes(MULTI_LEVEL_WILDCARD)) {
      return { valid: false, reason: `Level "${level}" mixes a wildcard with other characters` };
    }

    if (level.includes('\u0000')) {
      return { valid: false, reason: 'Pattern contains a NUL character' };
    }
  }

  return { valid: true };
}

/**
 * Test whether a concrete topic matches a (validated) pattern.
 *
 * `a/#` matches `a`, `a/b` and `a/b/c`; `a/+/c` matches `a/b/c` but not `a/b/d/c`.
 */
export function matchesPattern(topic: string, pattern: string): boolean {
  const topicLevels = topic.split(LEVEL_SEPARATOR);
  const patternLevels = pattern.split(LEVEL_SEPARATOR);

  for (let i = 0; i < patternLevels.length; i++) {
    const patternLevel = patternLevels[i];

    if (patternLevel === MULTI_LEVEL_WILDCARD) return true;

    if (i >= topicLevels.length) return false;

    if (patternLevel !== SINGLE_LEVEL_WILDCARD && patternLevel !== topicLevels[i]) return false;
  }

  return topicLevels.length === patternLevels.length;
}

/** True when a topic is usable as a publish target (no wildcards, no NUL). */
export function isPublishableTopic(topic: string): boolean {
  return (
    topic.length > 0 &&
    !topic.includes(SINGLE_LEVEL_WILDCARD) &&
    !topic.includes(MULTI_LEVEL_WILDCARD) &&
    !topic.includes('\u0000')
  );
}
