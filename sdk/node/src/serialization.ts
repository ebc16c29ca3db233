/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Request payload encoding.
 */

import { XMLBuilder } from 'fast-xml-parser';
import { ConfigurationError } from './errors';
import { PayloadFormat, formatOf } from './negotiation';

/** A structured payload; anything else is sent as-is. */
export type StructuredPayload = Record<string, unknown>;
export type Payload = string | StructuredPayload;

const xmlBuilder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

export function isStructuredPayload(payload: Payload): payload is StructuredPayload {
  return typeof payload === 'object' && payload !== null && !Array.isArray(payload);
}

export function toXml(payload: StructuredPayload): string {
  return xmlBuilder.build(payload).trim();
}

function encodeAs(format: PayloadFormat, payload: StructuredPayload): string {
  switch (format) {
    case 'json':
      return JSON.stringify(payload);
    case 'xml':
      return toXml(payload);
  }
}

/**
 * Encode a payload for the wire. Strings pass through untouched; mappings
 * need an explicit `json` or `xml` content type.
 */
export function serializePayload(payload: Payload, contentType: string | undefined): string {
  if (!isStructuredPayload(payload)) return payload;

  if (contentType === undefined) {
    throw new ConfigurationError('A content type is required when the payload is a mapping');
  }
  const format = formatOf(contentType);
  if (!format) {
    throw new ConfigurationError(`Cannot encode a mapping payload as '${contentType}'; use 'json' or 'xml'`);
  }
  return encodeAs(format, payload);
}
