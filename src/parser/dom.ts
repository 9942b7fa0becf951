import { HTMLElement, TextNode, type Node } from "node-html-parser";

export function tagName(element: HTMLElement): string {
  return (element.rawTagName ?? "").toLowerCase();
}

export function isTag(node: Node | null | undefined, ...tags: string[]): node is HTMLElement {
  return node instanceof HTMLElement && tags.includes(tagName(node));
}

export function childElements(element: HTMLElement, ...tags: string[]): HTMLElement[] {
  return element.childNodes.filter((child): child is HTMLElement =>
    tags.length === 0 ? child instanceof HTMLElement : isTag(child, ...tags),
  );
}

/** Descendant elements with one of the given tags, in document order. */
export function descendants(element: HTMLElement, ...tags: string[]): HTMLElement[] {
  const found: HTMLElement[] = [];
  const visit = (node: HTMLElement) => {
    for (const child of node.childNodes) {
      if (child instanceof HTMLElement) {
        if (isTag(child, ...tags)) {
          found.push(child);
        }
        visit(child);
      }
    }
  };
  visit(element);
  return found;
}

function textNodes(node: Node): TextNode[] {
  if (node instanceof TextNode) {
    return [node];
  }
  return node.childNodes.flatMap(textNodes);
}

/**
 * Trims every text node under `node` and joins the non-empty pieces with
 * `separator`. With the default empty separator, text split across `<br>`
 * is glued together: `1 Ιουλίου<br>2025` reads as `1 Ιουλίου2025`.
 */
export function strippedText(node: Node, separator = ""): string {
  return textNodes(node)
    .map((text) => text.text.trim())
    .filter((text) => text.length > 0)
    .join(separator);
}

export function nextSiblingNode(node: Node): Node | null {
  const parent = node.parentNode;
  if (!parent) {
    return null;
  }
  const siblings = parent.childNodes;
  const index = siblings.indexOf(node);
  return index >= 0 && index + 1 < siblings.length ? siblings[index + 1] : null;
}

export function followingSiblingElements(element: HTMLElement): HTMLElement[] {
  const parent = element.parentNode;
  if (!parent) {
    return [];
  }
  const siblings = parent.childNodes;
  return siblings
    .slice(siblings.indexOf(element) + 1)
    .filter((sibling): sibling is HTMLElement => sibling instanceof HTMLElement);
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/** Runs each strategy in order and returns the first non-null result. */
export function firstResult<T>(strategies: ReadonlyArray<() => T | null>): T | null {
  for (const strategy of strategies) {
    const result = strategy();
    if (result !== null) {
      return result;
    }
  }
  return null;
}
