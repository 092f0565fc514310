import { hasChildren, isTag, isText, type AnyNode, type Element, type Text } from 'domhandler';

const SKIPPED_TAGS: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template', 'head']);

function collectText(node: AnyNode, parts: string[]): string[] {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) {
      parts.push(text);
    }
    return parts;
  }

  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return parts;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
  return parts;
}

/** Rendered-ish text: text nodes joined by single spaces, so adjacent cells never run together. */
export function textOf(node: AnyNode): string {
  return collectText(node, []).join(' ').replace(/\s+/g, ' ').trim();
}

export function isLeafElement(node: AnyNode): boolean {
  return isTag(node) && node.children.every((child) => !isTag(child));
}

function collectTextNodes(node: AnyNode, nodes: Text[]): Text[] {
  if (isText(node)) {
    if (node.data.trim()) {
      nodes.push(node);
    }
    return nodes;
  }

  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return nodes;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectTextNodes(child, nodes);
    }
  }
  return nodes;
}

/** Non-blank text nodes under `root` in document order, outside scripts and styles. */
export function textNodesOf(root: AnyNode): Text[] {
  return collectTextNodes(root, []);
}

export function isWithin(node: AnyNode, bound: Element): boolean {
  for (let current: AnyNode | null = node; current; current = current.parent) {
    if (current === bound) {
      return true;
    }
  }
  return false;
}
