import Ajv from 'ajv';
import { readFileSync } from 'fs';

export const MESSAGE_TEXT_LIMIT = 4096;
const CALLBACK_DATA_LIMIT = 64;
const EMPTY_ANSWER = '👀';

export type MenuLayout = 'row' | 'column';

interface NodeBase {
  /** Button identifier, unique among its siblings */
  code: string;
  /** Dot-separated codes of the enclosing submenus */
  path: string;
  label: string;
}

export interface AnswerNode extends NodeBase {
  kind: 'answer';
  answer: string;
}

export interface SubmenuNode extends NodeBase {
  kind: 'menu';
  answer: string;
  layout: MenuLayout;
  children: readonly MenuNode[];
}

export interface LinkNode extends NodeBase {
  kind: 'link';
  url: string;
}

export interface FileNode extends NodeBase {
  kind: 'file';
  /** File name under the menu files directory */
  file: string;
  caption: string;
}

export interface SubjectNode extends NodeBase {
  kind: 'subject';
  subject: string;
  answer: string;
}

export type MenuNode = AnswerNode | SubmenuNode | LinkNode | FileNode | SubjectNode;

export interface MenuTree {
  root: SubmenuNode;
}

// ───── Raw JSON shape ─────

interface RawMenuNode {
  label: string;
  answer?: string;
  menumode?: MenuLayout;
  items?: Record<string, RawMenuNode>;
  link?: string;
  file?: string;
  subject?: string;
}

interface RawMenu {
  answer: string;
  menumode?: MenuLayout;
  items: Record<string, RawMenuNode>;
}

const MODE_KEYS = ['items', 'link', 'file', 'subject'];

const MENU_SCHEMA = {
  definitions: {
    items: {
      type: 'object',
      minProperties: 1,
      propertyNames: { pattern: '^[A-Za-z0-9_-]{1,16}$' },
      additionalProperties: { $ref: '#/definitions/node' },
    },
    node: {
      type: 'object',
      required: ['label'],
      properties: {
        label: { type: 'string', minLength: 1 },
        answer: { type: 'string' },
        menumode: { enum: ['row', 'column'] },
        items: { $ref: '#/definitions/items' },
        link: { type: 'string', pattern: '^https?://' },
        file: { type: 'string', pattern: '^\\w[\\w.-]*$' },
        subject: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
      // exactly one mode; a bare answer counts only when no other mode is present
      oneOf: [
        ...MODE_KEYS.map((key) => ({ required: [key] })),
        { required: ['answer'], not: { anyOf: MODE_KEYS.map((key) => ({ required: [key] })) } },
      ],
    },
  },
  type: 'object',
  required: ['answer', 'items'],
  properties: {
    answer: { type: 'string' },
    menumode: { enum: ['row', 'column'] },
    items: { $ref: '#/definitions/items' },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, strictTypes: false });
const validateMenu = ajv.compile<RawMenu>(MENU_SCHEMA);

function answerText(raw: string | undefined, allowEmpty: boolean): string {
  const text = (raw ?? '').slice(0, MESSAGE_TEXT_LIMIT);
  return text || allowEmpty ? text : EMPTY_ANSWER;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const inner of Object.values(value)) {
    if (typeof inner === 'object' && inner !== null && !Object.isFrozen(inner)) deepFreeze(inner);
  }
  return Object.freeze(value);
}

function toNode(code: string, path: string, raw: RawMenuNode): MenuNode {
  const base = { code, path, label: raw.label };
  const callbackBytes = Buffer.byteLength(`_:${path}:${code}:`) + String(Number.MAX_SAFE_INTEGER).length;
  if (callbackBytes > CALLBACK_DATA_LIMIT) {
    throw new Error(`Menu item "${path ? `${path}.` : ''}${code}" is nested too deep for button callback data`);
  }

  if (raw.link !== undefined) return { ...base, kind: 'link', url: raw.link };
  if (raw.file !== undefined) return { ...base, kind: 'file', file: raw.file, caption: answerText(raw.answer, true) };
  if (raw.items !== undefined) {
    const childPath = path ? `${path}.${code}` : code;
    return {
      ...base,
      kind: 'menu',
      answer: answerText(raw.answer, false),
      layout: raw.menumode ?? 'column',
      children: toChildren(childPath, raw.items),
    };
  }
  if (raw.subject !== undefined) return { ...base, kind: 'subject', subject: raw.subject, answer: answerText(raw.answer, true) };
  return { ...base, kind: 'answer', answer: answerText(raw.answer, false) };
}

function toChildren(path: string, items: Record<string, RawMenuNode>): MenuNode[] {
  return Object.entries(items).map(([code, raw]) => toNode(code, path, raw));
}

/** Validate a parsed menu document and build the immutable tree */
export function buildMenuTree(document: unknown): MenuTree {
  if (!validateMenu(document)) {
    const details = ajv.errorsText(validateMenu.errors);
    throw new Error(`Invalid menu configuration: ${details}`);
  }
  const root: SubmenuNode = {
    kind: 'menu',
    code: '',
    path: '',
    label: '',
    answer: answerText(document.answer, false),
    layout: document.menumode ?? 'column',
    children: toChildren('', document.items),
  };
  return deepFreeze({ root });
}

export function loadMenuTree(filePath: string): MenuTree {
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return buildMenuTree(parsed);
}

/** Resolve a button by the path of its submenu and its code; empty path and code mean the root */
export function findMenuNode(tree: MenuTree, path: string, code: string): MenuNode | null {
  if (!path && !code) return tree.root;
  let menu: SubmenuNode = tree.root;
  for (const segment of path.split('.').filter(Boolean)) {
    const next = menu.children.find((child) => child.code === segment);
    if (!next || next.kind !== 'menu') return null;
    menu = next;
  }
  return menu.children.find((child) => child.code === code) ?? null;
}

/** Path under which this submenu's children live */
export function childPathOf(menu: SubmenuNode): string {
  if (!menu.code) return '';
  return menu.path ? `${menu.path}.${menu.code}` : menu.code;
}
