/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * YANG media-type negotiation.
 *
 * The device's northbound REST API distinguishes data, collection, datastore
 * and operation resources by vendor media type. `json` and `xml` are shorthand
 * for the matching `+json` / `+xml` suffix; any other content type string is
 * used literally for both Accept and Content-type.
 */

export type PayloadFormat = 'json' | 'xml';

export const YANG_DATA = 'application/vnd.yang.data';
export const YANG_COLLECTION = 'application/vnd.yang.collection';
export const YANG_DATASTORE = 'application/vnd.yang.datastore';
export const YANG_OPERATION = 'application/vnd.yang.operation';

export function formatOf(contentType: string): PayloadFormat | undefined {
  const lowered = contentType.toLowerCase();
  return lowered === 'json' || lowered === 'xml' ? lowered : undefined;
}

/** Heuristic: anything whose first non-blank character is `<` is XML. */
export function sniffContentType(payload: string): PayloadFormat {
  return payload.trimStart().startsWith('<') ? 'xml' : 'json';
}

export function acceptHeader(contentType: string): string {
  const format = formatOf(contentType);
  if (!format) return contentType;
  return [YANG_DATA, YANG_COLLECTION, YANG_DATASTORE].map((type) => `${type}+${format}`).join(', ');
}

/**
 * Content-type for a request body, chosen by the shape of the resource path:
 * `/_operations` addresses RPCs and actions, `/api/` a datastore.
 */
export function contentTypeHeader(path: string, contentType: string): string {
  const format = formatOf(contentType);
  if (!format) return contentType;
  if (path.includes('/_operations')) return `${YANG_OPERATION}+${format}`;
  if (path.includes('/api/')) return `${YANG_DATASTORE}+${format}`;
  return `${YANG_DATA}+${format}`;
}

/**
 * Merge header maps left to right. Names compare case-insensitively and a
 * later layer replaces the earlier entry, taking its spelling.
 */
export function mergeHeaders(...layers: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  const names = new Map<string, string>();
  for (const layer of layers) {
    if (!layer) continue;
    for (const [name, value] of Object.entries(layer)) {
      const key = name.toLowerCase();
      const previous = names.get(key);
      if (previous !== undefined) delete merged[previous];
      names.set(key, name);
      merged[name] = value;
    }
  }
  return merged;
}
