import { existsSync, readFileSync } from 'node:fs';
import { parseNodeSnapshots } from '@vramfit/protocol';
import type { DirectorySnapshot, NodeSnapshot } from '@vramfit/protocol';
import type { NodeDirectory } from './types';

const freezeNode = (node: NodeSnapshot): NodeSnapshot => {
  const copy = node.location ? { ...node, location: Object.freeze({ ...node.location }) } : { ...node };
  return Object.freeze(copy);
};

export class InMemoryNodeDirectory implements NodeDirectory {
  private nodes = new Map<string, NodeSnapshot>();
  private nowMs: () => number;

  constructor(nodes: readonly NodeSnapshot[] = [], nowMs: () => number = Date.now) {
    this.nowMs = nowMs;
    for (const node of nodes) {
      this.upsert(node);
    }
  }

  upsert(node: NodeSnapshot): void {
    this.nodes.set(node.nodeId, freezeNode(node));
  }

  remove(nodeId: string): boolean {
    return this.nodes.delete(nodeId);
  }

  size(): number {
    return this.nodes.size;
  }

  async snapshot(): Promise<DirectorySnapshot> {
    // Entries are frozen on write, so sharing them across snapshots is safe.
    return Object.freeze({
      capturedAtMs: this.nowMs(),
      nodes: Object.freeze([...this.nodes.values()]),
    });
  }
}

export const readNodesFile = (path: string): NodeSnapshot[] => {
  if (!existsSync(path)) {
    throw new Error(`node file not found: ${path}`);
  }
  const parsed = parseNodeSnapshots(JSON.parse(readFileSync(path, 'utf8')));
  if (!parsed.ok) {
    throw new Error(`invalid node file ${path}: ${parsed.errors.join('; ')}`);
  }
  return parsed.value;
};
