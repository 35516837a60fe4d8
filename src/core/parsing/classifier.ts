/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventTag, LifecycleKind, OperationPhase } from '../types.js';

const LIFECYCLE_ROLES = ['Client', 'Server', 'TTP'] as const;
const LIFECYCLE_STEPS = ['Keys_Params', 'ZeroMQ'] as const;

/** Every `<Role> Initialisation <Step> <Start|End>` phrase the protocol writes. */
export const LIFECYCLE_PHRASES: readonly string[] = LIFECYCLE_ROLES.flatMap((role) =>
  LIFECYCLE_STEPS.flatMap((step) =>
    ['Start', 'End'].map((phase) => `${role} Initialisation ${step} ${phase}`),
  ),
);

const BATCH_ON_PHRASES = ['Start Batch Processing', 'Batch Start'];
const BATCH_OFF_PHRASES = ['End Batch Processing', 'Batch End'];

const TRAILING_SEPARATOR = /\s+:\s*$/;

const RAM_VALUE = /RAM: (\d+) kB/;
const SWAP_VALUE = /SWAP: (\d+) kB/;
const RAM_PEAK_VALUE = /RAM Peak: (\d+) kB/;

const CATEGORY_RULES: Array<{ keywords: string[]; category: string }> = [
  { keywords: ['encryption', 'kreyvium'], category: 'Encryption' },
  { keywords: ['decryption'], category: 'Decryption' },
  { keywords: ['transciphering'], category: 'Transciphering' },
  { keywords: ['batch transmission'], category: 'Batch Transmission' },
  { keywords: ['batch'], category: 'Batch' },
  { keywords: ['integer'], category: 'Integer' },
  { keywords: ['initialized'], category: 'Initialization' },
];

export const isInitializedEvent = (payload: string): boolean =>
  payload.toLowerCase().includes('initialized');

export const matchLifecyclePhrase = (payload: string): LifecycleKind | undefined => {
  const phrase = LIFECYCLE_PHRASES.find((candidate) => payload.includes(candidate));
  if (!phrase) {
    return undefined;
  }
  if (phrase.includes('Keys_Params')) {
    return 'keys_params';
  }
  return phrase.includes('ZeroMQ Start') ? 'zeromq_start' : 'zeromq_end';
};

/**
 * Reads `<name> Start` / `<name> End`, ignoring anything after the first ` : `
 * (the writer appends payload dumps there). An empty dump leaves a bare
 * trailing ` :` once the line is trimmed.
 */
export const extractOperation = (
  payload: string,
): { phase: OperationPhase; name: string } | undefined => {
  const head = payload.split(' : ')[0].replace(TRAILING_SEPARATOR, '').trim();
  for (const [suffix, phase] of [
    [' Start', 'start'],
    [' End', 'end'],
  ] as const) {
    if (head.endsWith(suffix)) {
      const name = head.slice(0, -suffix.length).trim();
      return name ? { phase, name } : undefined;
    }
  }
  return undefined;
};

export const categorizeOperation = (name: string): string => {
  const lower = name.toLowerCase();
  const rule = CATEGORY_RULES.find(({ keywords }) =>
    keywords.some((keyword) => lower.includes(keyword)),
  );
  return rule?.category ?? name;
};

const readKb = (pattern: RegExp, payload: string): number | undefined => {
  const match = pattern.exec(payload);
  return match ? Number.parseInt(match[1], 10) : undefined;
};

/**
 * Tags a payload. Rules are checked independently, in a fixed order, so a
 * caller folding the tags sees them in the order the log writer intends
 * (markers before the readings that consume them).
 */
export const classifyPayload = (payload: string): EventTag[] => {
  const tags: EventTag[] = [];
  const initialized = isInitializedEvent(payload);
  if (initialized) {
    tags.push({ type: 'initialized' });
  }

  const lifecycle = matchLifecyclePhrase(payload);
  if (lifecycle) {
    tags.push({ type: 'lifecycle', kind: lifecycle });
  }

  if (BATCH_ON_PHRASES.some((phrase) => payload.includes(phrase))) {
    tags.push({ type: 'batch', active: true });
  } else if (BATCH_OFF_PHRASES.some((phrase) => payload.includes(phrase))) {
    tags.push({ type: 'batch', active: false });
  }

  if (payload.includes('RAM:') && !payload.includes('RAM Peak:')) {
    const kb = readKb(RAM_VALUE, payload);
    if (kb !== undefined) {
      tags.push({ type: 'ram', kb });
    }
  }
  if (payload.includes('SWAP:')) {
    const kb = readKb(SWAP_VALUE, payload);
    if (kb !== undefined) {
      tags.push({ type: 'swap', kb });
    }
  }
  if (payload.includes('RAM Peak:')) {
    const kb = readKb(RAM_PEAK_VALUE, payload);
    if (kb !== undefined) {
      tags.push({ type: 'ram-peak', kb });
    }
  }

  if (!initialized) {
    const operation = extractOperation(payload);
    if (operation) {
      tags.push({
        type: 'operation',
        phase: operation.phase,
        name: operation.name,
        category: categorizeOperation(operation.name),
      });
    }
  }

  return tags;
};
