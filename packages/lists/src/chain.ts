/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Owned singly-linked chain.
 *
 * Every node has exactly one owner: either the chain (reachable from head)
 * or the caller that detached it. A node may only be released once it is
 * no longer linked to a successor.
 */

import { InvariantViolationError } from '@dxfio/data';

export interface ChainNode<T> {
  value: T;
  next: ChainNode<T> | null;
}

export class Chain<T> implements Iterable<T> {
  private _head: ChainNode<T> | null = null;
  private tail: ChainNode<T> | null = null;
  private count = 0;

  constructor(values: Iterable<T> = []) {
    for (const value of values) {
      this.append(value);
    }
  }

  get head(): ChainNode<T> | null {
    return this._head;
  }

  get length(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Append at the tail. O(1).
   */
  append(value: T): this {
    const node: ChainNode<T> = { value, next: null };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this._head = node;
    }
    this.tail = node;
    this.count++;
    return this;
  }

  /**
   * Value at a 0-based position, or undefined past the end
   */
  at(index: number): T | undefined {
    if (index < 0 || index >= this.count) return undefined;
    let node = this._head;
    for (let i = 0; node && i < index; i++) {
      node = node.next;
    }
    return node?.value;
  }

  /** Last value, or undefined when empty */
  last(): T | undefined {
    return this.tail?.value;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let node = this._head; node; node = node.next) {
      yield node.value;
    }
  }

  toArray(): T[] {
    return [...this];
  }

  /**
   * Unlink the head node and hand its ownership to the caller.
   * The returned node has next === null.
   */
  detachHead(): ChainNode<T> | null {
    const node = this._head;
    if (!node) return null;
    this._head = node.next;
    if (!this._head) {
      this.tail = null;
    }
    node.next = null;
    this.count--;
    return node;
  }

  /**
   * Release a single detached node.
   * @throws InvariantViolationError if the node still links to a successor
   */
  static release<T>(node: ChainNode<T>): void {
    if (node.next !== null) {
      throw new InvariantViolationError('Cannot release a node whose next pointer is not null');
    }
  }

  /**
   * Release every node, head to tail, detaching each before release.
   * Iterative, so chain length does not grow the stack.
   */
  freeChain(): void {
    let node = this.detachHead();
    while (node) {
      Chain.release(node);
      node = this.detachHead();
    }
  }
}
