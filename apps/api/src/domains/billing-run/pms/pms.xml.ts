// ============================================================================
// Billing Run — PMS SOAP XML helpers
// Hand-built request envelopes and regex extraction of response elements.
// ============================================================================

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type XmlScalar = string | number | boolean;

export type XmlValue = XmlScalar | XmlNode | XmlNode[] | null | undefined;

export interface XmlNode {
  [tag: string]: XmlValue;
}

const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const REQUEST_PREFIX = 'sch';

// ---------------------------------------------------------------------------
// Escaping
// ---------------------------------------------------------------------------

export function escapeXml(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_m, code: string) => String.fromCharCode(Number(code)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_m, code: string) => String.fromCharCode(parseInt(code, 16)))
    .replace(/&amp;/g, '&');
}

// ---------------------------------------------------------------------------
// Building
// ---------------------------------------------------------------------------

/**
 * Serialize one element. Arrays repeat the tag once per item; null and
 * undefined are omitted. Children are written in ordinal order because the
 * service's data contracts drop members that arrive out of order.
 */
export function toXmlElement(tag: string, value: XmlValue): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) {
    return value.map((item) => toXmlElement(tag, item)).join('');
  }
  const name = `${REQUEST_PREFIX}:${tag}`;
  if (typeof value === 'object') {
    const children = Object.keys(value)
      .sort()
      .map((key) => toXmlElement(key, value[key]))
      .join('');
    return `<${name}>${children}</${name}>`;
  }
  return `<${name}>${escapeXml(String(value))}</${name}>`;
}

export interface EnvelopeOptions {
  namespace: string;
  operation: string;
  requestHeader: XmlNode;
  body: XmlNode;
}

/** Wraps `<Operation><request>` with the request header written first. */
export function buildSoapEnvelope(opts: EnvelopeOptions): string {
  const p = REQUEST_PREFIX;
  return [
    `<soapenv:Envelope xmlns:soapenv="${SOAP_ENVELOPE_NS}" xmlns:${p}="${escapeXml(opts.namespace)}">`,
    '<soapenv:Header/>',
    '<soapenv:Body>',
    `<${p}:${opts.operation}>`,
    `<${p}:request>`,
    toXmlElement('RequestHeader', opts.requestHeader),
    Object.keys(opts.body)
      .sort()
      .map((key) => toXmlElement(key, opts.body[key]))
      .join(''),
    `</${p}:request>`,
    `</${p}:${opts.operation}>`,
    '</soapenv:Body>',
    '</soapenv:Envelope>',
  ].join('');
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

// Tag name must end exactly (no `<IDType>` when looking for `ID`), and
// self-closing elements carry no content.
function openTag(tagName: string): string {
  return `<(?:[a-zA-Z0-9]+:)?${tagName}(?:\\s[^>]*)?(?<!/)>`;
}

function closeTag(tagName: string): string {
  return `</(?:[a-zA-Z0-9]+:)?${tagName}>`;
}

/** Text of the first `tagName` element, entity-decoded and trimmed. Empty → null. */
export function extractXmlText(xml: string, tagName: string): string | null {
  const match = xml.match(new RegExp(`${openTag(tagName)}([^<]*)${closeTag(tagName)}`));
  if (!match) return null;
  const text = decodeXmlEntities(match[1]).trim();
  return text || null;
}

/** Full markup of every `tagName` element, in document order. */
export function extractXmlElements(xml: string, tagName: string): string[] {
  const results: string[] = [];
  const pattern = new RegExp(`${openTag(tagName)}[\\s\\S]*?${closeTag(tagName)}`, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(xml)) !== null) {
    results.push(match[0]);
  }
  return results;
}

/** Removes every `tagName` element so parent-level fields can be read unambiguously. */
export function stripXmlElements(xml: string, tagName: string): string {
  return xml.replace(
    new RegExp(`${openTag(tagName)}[\\s\\S]*?${closeTag(tagName)}`, 'g'),
    '',
  );
}

export function extractXmlBoolean(xml: string, tagName: string): boolean {
  return extractXmlText(xml, tagName)?.toLowerCase() === 'true';
}
