import * as xml2js from 'xml2js';

export type XmlNode = { [key: string]: unknown };

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @hebrew עם explicitArray=false אלמנט יחיד מגיע כאובייקט ומספר אלמנטים כמערך.
 * הפונקציה מחזירה תמיד מערך.
 */
export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

export function childNode(node: XmlNode | undefined, key: string): XmlNode | undefined {
  const child = node?.[key];
  return isXmlNode(child) ? child : undefined;
}

export function nodeText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  // אלמנט עם מאפיינים: הטקסט נמצא תחת '_'
  if (isXmlNode(value) && typeof value._ === 'string') return value._;
  return undefined;
}

export function childText(node: XmlNode | undefined, key: string): string | undefined {
  return nodeText(node?.[key]);
}

export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  const attrs = node?.$;
  return isXmlNode(attrs) ? nodeText(attrs[name]) : undefined;
}

/** מסיר את ה-xmlns הראשון (ברירת המחדל) מהמסמך. */
export function stripDefaultNamespace(xml: string): string {
  return xml.replace(/ xmlns="[^"]+"/, '');
}

export interface ParseXmlOptions {
  /** המרת מספרים ובוליאנים בערכי הטקסט */
  parseValues?: boolean;
}

/**
 * @hebrew מנתח מסמך XML לאובייקט, בלי אלמנט השורש ובלי קידומות namespace.
 * @throws Error אם המסמך אינו XML תקין או שאין בו אלמנט שורש עם תוכן.
 */
export async function parseXml(xml: string, options: ParseXmlOptions = {}): Promise<XmlNode> {
  const parser = new xml2js.Parser({
    explicitArray: false,
    explicitRoot: false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
    attrNameProcessors: [xml2js.processors.stripPrefix],
    valueProcessors: options.parseValues
      ? [xml2js.processors.parseNumbers, xml2js.processors.parseBooleans]
      : [],
  });
  const parsed: unknown = await parser.parseStringPromise(xml);
  if (!isXmlNode(parsed)) {
    throw new Error('XML document has no element content');
  }
  return parsed;
}
