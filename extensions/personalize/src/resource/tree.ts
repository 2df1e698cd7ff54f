/**
 * Parent -> children adjacency of listed resources.
 *
 * Built in a single listing pass and discarded afterwards. Elements are keyed
 * by kind and ARN; an element may be added as a child at most once.
 */

import type { ResourceKind } from "./kinds.js";

export type ResourceElement = {
  readonly kind: ResourceKind;
  readonly arn: string;
};

function elementKey(element: ResourceElement): string {
  return `${element.kind}|${element.arn}`;
}

export class ResourceTree {
  private elements = new Map<string, ResourceElement>();
  private parents = new Map<string, string>();
  private childIndex = new Map<string, string[]>();

  add(parent: ResourceElement, child: ResourceElement): void {
    const childKey = elementKey(child);
    if (this.parents.has(childKey)) {
      throw new Error(`element ${child.kind} ${child.arn} already exists`);
    }

    const parentKey = elementKey(parent);
    this.elements.set(parentKey, parent);
    this.elements.set(childKey, child);
    this.parents.set(childKey, parentKey);

    const siblings = this.childIndex.get(parentKey) ?? [];
    siblings.push(childKey);
    this.childIndex.set(parentKey, siblings);
  }

  children(of: ResourceElement, where: (element: ResourceElement) => boolean = () => true): ResourceElement[] {
    const keys = this.childIndex.get(elementKey(of)) ?? [];
    const result: ResourceElement[] = [];
    for (const key of keys) {
      const element = this.elements.get(key);
      if (element && where(element)) result.push(element);
    }
    return result;
  }

  parentOf(child: ResourceElement): ResourceElement | undefined {
    const parentKey = this.parents.get(elementKey(child));
    return parentKey ? this.elements.get(parentKey) : undefined;
  }

  /**
   * Walk up to the topmost ancestor.
   */
  rootOf(element: ResourceElement): ResourceElement {
    let current = element;
    let parent = this.parentOf(current);
    while (parent) {
      current = parent;
      parent = this.parentOf(current);
    }
    return current;
  }

  has(element: ResourceElement): boolean {
    return this.elements.has(elementKey(element));
  }

  get size(): number {
    return this.parents.size;
  }
}
