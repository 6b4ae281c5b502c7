/**
 * Hierarchical chunking strategy
 *
 * Sections that fit become one segment. A section that does not fit is
 * split: its heading line becomes the parent segment, its body is packed
 * into overlapping sentence windows, and its subsections are handled the
 * same way one level down.
 *
 * @module services/chunking/hierarchical
 */

import { TokenCounter } from './token-counter.js';
import {
  SectionNode,
  TextSpan,
  buildSectionTree,
  findHeadings,
  splitSentences,
} from './boundaries.js';

/**
 * A planned segment: a span of the joined text plus the index of its
 * parent draft. Drafts are produced in document order.
 */
export interface SegmentDraft {
  start: number;
  end: number;
  parentIndex: number | null;
  /** A single sentence larger than maxTokens */
  oversized: boolean;
}

export interface HierarchicalOptions {
  maxTokens: number;
  overlapTokens: number;
}

export function planHierarchical(
  text: string,
  options: HierarchicalOptions,
  counter: TokenCounter
): SegmentDraft[] {
  const { maxTokens, overlapTokens } = options;
  const drafts: SegmentDraft[] = [];
  const tokensIn = (start: number, end: number): number => counter.count(text.slice(start, end));

  const packWindows = (span: TextSpan, parentIndex: number | null): void => {
    const atoms = splitSentences(text, span.start, span.end);
    const n = atoms.length;
    if (n === 0) return;

    const prefix = [0];
    for (const atom of atoms) {
      prefix.push(prefix[prefix.length - 1] + tokensIn(atom.start, atom.end));
    }
    const sum = (from: number, to: number): number => prefix[to] - prefix[from];

    let i = 0;
    while (i < n) {
      let j = i;
      while (j < n && sum(i, j + 1) <= maxTokens) j++;

      if (j === i) {
        // Never split inside a sentence; never overlap into or out of one.
        drafts.push({ start: atoms[i].start, end: atoms[i].end, parentIndex, oversized: true });
        i++;
        continue;
      }

      // Close at the last paragraph break if that keeps the window at least half full.
      if (j < n) {
        for (let k = j; k > i && sum(i, k) >= maxTokens / 2; k--) {
          if (atoms[k - 1].paragraphEnd) {
            j = k;
            break;
          }
        }
      }

      drafts.push({ start: atoms[i].start, end: atoms[j - 1].end, parentIndex, oversized: false });
      if (j >= n) break;

      let next = j;
      while (next - 1 > i && sum(next - 1, j) <= overlapTokens) next--;
      while (next < j && sum(next, j + 1) > maxTokens) next++;
      i = next;
    }
  };

  const emitSection = (node: SectionNode, parentIndex: number | null): void => {
    if (text.slice(node.start, node.end).trim().length === 0) return;

    if (tokensIn(node.start, node.end) <= maxTokens) {
      drafts.push({ start: node.start, end: node.end, parentIndex, oversized: false });
      return;
    }

    let childParent = parentIndex;
    if (node.heading) {
      drafts.push({
        start: node.heading.start,
        end: node.heading.end,
        parentIndex,
        oversized: tokensIn(node.heading.start, node.heading.end) > maxTokens,
      });
      childParent = drafts.length - 1;
    }

    packWindows(node.body, childParent);
    for (const child of node.children) {
      emitSection(child, childParent);
    }
  };

  emitSection(buildSectionTree(text, findHeadings(text)), null);
  return drafts;
}
