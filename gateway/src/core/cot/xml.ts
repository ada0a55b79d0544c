/**
 * 최소 XML 직렬화
 */

export interface XmlElement {
  name: string;
  attrs?: Record<string, string>;
  text?: string;
  children?: XmlElement[];
}

export const XML_DECLARATION = "<?xml version='1.0' encoding='UTF-8'?>";

const TEXT_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

const ATTR_ESCAPES: Record<string, string> = {
  ...TEXT_ESCAPES,
  '"': '&quot;',
  "'": '&apos;',
  '\n': '&#10;',
  '\r': '&#13;',
  '\t': '&#9;',
};

/** XML 1.0에서 허용되지 않는 제어 문자 */
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeText(value: string): string {
  return value.replace(INVALID_XML_CHARS, '').replace(/[&<>]/g, (ch) => TEXT_ESCAPES[ch]);
}

export function escapeAttr(value: string): string {
  return value.replace(INVALID_XML_CHARS, '').replace(/[&<>"'\n\r\t]/g, (ch) => ATTR_ESCAPES[ch]);
}

function renderElement(element: XmlElement, depth: number, indent: string): string[] {
  const pad = indent.repeat(depth);
  const attrs = Object.entries(element.attrs ?? {})
    .map(([key, value]) => ` ${key}="${escapeAttr(value)}"`)
    .join('');
  const children = element.children ?? [];

  if (children.length === 0 && element.text === undefined) {
    return [`${pad}<${element.name}${attrs}/>`];
  }
  if (children.length === 0) {
    return [`${pad}<${element.name}${attrs}>${escapeText(element.text ?? '')}</${element.name}>`];
  }

  const lines = [`${pad}<${element.name}${attrs}>`];
  for (const child of children) {
    lines.push(...renderElement(child, depth + 1, indent));
  }
  lines.push(`${pad}</${element.name}>`);
  return lines;
}

/**
 * 선언부를 포함한 문서 문자열 생성
 */
export function renderDocument(root: XmlElement, indent: string = '  '): string {
  return [XML_DECLARATION, ...renderElement(root, 0, indent)].join('\n') + '\n';
}
