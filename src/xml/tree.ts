import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlElement {
  /** Tag as written, prefix included. */
  readonly name: string;
  readonly localName: string;
  /** Resolved namespace URI, null when the element is in no namespace. */
  readonly namespace: string | null;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
  /** Direct text segments joined by a space; child element text is not included. */
  readonly text: string | null;
}

export class XmlParseError extends Error {
  constructor(
    message: string,
    readonly line?: number,
    readonly column?: number,
  ) {
    super(message);
    this.name = 'XmlParseError';
  }
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // numeric character references (`&#233;`, `&#x2019;`) are only decoded with this on
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

type NamespaceScope = ReadonlyMap<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const raw = node[ATTRIBUTES_KEY];
  const out: Record<string, string> = {};
  if (!isRecord(raw)) {
    return out;
  }
  for (const [key, value] of Object.entries(raw)) {
    out[key] = typeof value === 'string' ? value : String(value);
  }
  return out;
}

function extendScope(parent: NamespaceScope, attributes: Record<string, string>): NamespaceScope {
  let scope: Map<string, string> | null = null;
  for (const [key, value] of Object.entries(attributes)) {
    if (key !== 'xmlns' && !key.startsWith('xmlns:')) {
      continue;
    }
    scope ??= new Map(parent);
    scope.set(key === 'xmlns' ? '' : key.slice('xmlns:'.length), value);
  }
  return scope ?? parent;
}

function splitName(name: string): { prefix: string; localName: string } {
  const idx = name.indexOf(':');
  return idx < 0 ? { prefix: '', localName: name } : { prefix: name.slice(0, idx), localName: name.slice(idx + 1) };
}

function toElement(name: string, node: Record<string, unknown>, parentScope: NamespaceScope): XmlElement {
  const attributes = readAttributes(node);
  const scope = extendScope(parentScope, attributes);
  const { prefix, localName } = splitName(name);

  const uri = scope.get(prefix);
  if (prefix && uri === undefined) {
    throw new XmlParseError(`unbound namespace prefix "${prefix}" on <${name}>`);
  }

  const children: XmlElement[] = [];
  const text: string[] = [];
  const body = node[name];
  for (const child of Array.isArray(body) ? body : []) {
    if (!isRecord(child)) {
      continue;
    }
    const childName = Object.keys(child).find((key) => key !== ATTRIBUTES_KEY);
    if (!childName) {
      continue;
    }
    if (childName === TEXT_KEY) {
      const value = String(child[TEXT_KEY]);
      if (value.trim()) {
        text.push(value.trim());
      }
      continue;
    }
    children.push(toElement(childName, child, scope));
  }

  return {
    name,
    localName,
    namespace: uri ? uri : null,
    attributes,
    children,
    text: text.length ? text.join(' ') : null,
  };
}

function parseNodes(xml: string): unknown {
  let validation: ReturnType<typeof XMLValidator.validate>;
  let parsed: unknown;
  try {
    validation = XMLValidator.validate(xml);
    parsed = validation === true ? parser.parse(xml) : null;
  } catch (error) {
    throw new XmlParseError(error instanceof Error ? error.message : String(error));
  }
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlParseError(`${msg} (line ${line}, column ${col})`, line, col);
  }
  return parsed;
}

/**
 * Parses a complete XML document and returns its root element.
 *
 * The parser refuses element and attribute names such as `constructor` or
 * `__proto__`; such documents fail with a parse error even when well-formed.
 */
export function parseXml(xml: string): XmlElement {
  const parsed = parseNodes(xml);

  const roots: Array<{ name: string; node: Record<string, unknown> }> = [];
  for (const node of Array.isArray(parsed) ? parsed : []) {
    if (!isRecord(node)) {
      continue;
    }
    const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (name) {
      roots.push({ name, node });
    }
  }

  const [root, ...rest] = roots;
  if (!root) {
    throw new XmlParseError('no root element found');
  }
  if (rest.length) {
    throw new XmlParseError('junk after document element');
  }
  return toElement(root.name, root.node, new Map());
}

// ---------------------------------------------------------------------------
// lookups

export interface Step {
  namespace: string | null;
  localName: string;
  where?: Readonly<Record<string, string>>;
}

/** Builds steps bound to one namespace, e.g. `const ted = inNamespace(uri); ted('CPV_CODE')`. */
export function inNamespace(namespace: string | null) {
  return (localName: string, where?: Record<string, string>): Step => ({ namespace, localName, where });
}

export const plain = inNamespace(null);

function matches(el: XmlElement, step: Step): boolean {
  if (el.localName !== step.localName || el.namespace !== step.namespace) {
    return false;
  }
  if (!step.where) {
    return true;
  }
  return Object.entries(step.where).every(([key, value]) => el.attributes[key] === value);
}

export function childrenOf(el: XmlElement | null | undefined, step: Step): XmlElement[] {
  return el ? el.children.filter((child) => matches(child, step)) : [];
}

export function childOf(el: XmlElement | null | undefined, step: Step): XmlElement | null {
  return el?.children.find((child) => matches(child, step)) ?? null;
}

/** Descendants of `el` (not `el` itself) matching `step`, in document order. */
export function descendantsOf(el: XmlElement | null | undefined, step: Step): XmlElement[] {
  const out: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    for (const child of node.children) {
      if (matches(child, step)) {
        out.push(child);
      }
      visit(child);
    }
  };
  if (el) {
    visit(el);
  }
  return out;
}

/**
 * `.//first/second/...`: the first step matches at any depth below `el`,
 * each following step matches direct children.
 */
export function findAll(el: XmlElement | null | undefined, ...path: Step[]): XmlElement[] {
  const [first, ...rest] = path;
  if (!first) {
    return [];
  }
  let current = descendantsOf(el, first);
  for (const step of rest) {
    current = current.flatMap((node) => childrenOf(node, step));
  }
  return current;
}

export function find(el: XmlElement | null | undefined, ...path: Step[]): XmlElement | null {
  return findAll(el, ...path)[0] ?? null;
}

// ---------------------------------------------------------------------------
// accessors

export function text(el: XmlElement | null | undefined): string | null {
  const value = el?.text?.trim();
  return value ? value : null;
}

export function attribute(el: XmlElement | null | undefined, name: string): string | null {
  return el?.attributes[name] ?? null;
}
