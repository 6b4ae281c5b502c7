/**
 * Structural boundary detection: section headings and sentence spans.
 *
 * Every span is a half-open [start, end) range into the joined document
 * text. Sentence spans carry their trailing whitespace so that the spans
 * of a range tile it exactly.
 *
 * @module services/chunking/boundaries
 */

export interface TextSpan {
  start: number;
  end: number;
}

export interface SentenceSpan extends TextSpan {
  /** Followed by a blank line, or last in its range */
  paragraphEnd: boolean;
}

export interface Heading {
  /** 1 = top level */
  level: number;
  title: string;
  /** Start of the heading line */
  start: number;
  /** End of the heading line including its line break */
  end: number;
}

const MARKDOWN_HEADING = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/;
const NUMBERED_HEADING = /^(Chapter|Part|Section)[ \t]+\d+:?[ \t]+(.+?)[ \t]*$/;
const CODE_FENCE = /^[ \t]*(```|~~~)/;

/**
 * Heading lines in document order. Markdown headings take their level from
 * the number of '#'; "Chapter n" and "Part n" lines are level 1 and
 * "Section n" lines level 2. Lines inside fenced code blocks are ignored.
 */
export function findHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  let inFence = false;
  let lineStart = 0;

  while (lineStart < text.length) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const next = newline === -1 ? text.length : newline + 1;
    const line = text.slice(lineStart, lineEnd).replace(/\r$/, '');

    if (CODE_FENCE.test(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      const md = MARKDOWN_HEADING.exec(line);
      if (md) {
        headings.push({ level: md[1].length, title: md[2], start: lineStart, end: next });
      } else {
        const numbered = NUMBERED_HEADING.exec(line);
        if (numbered) {
          headings.push({
            level: numbered[1] === 'Section' ? 2 : 1,
            title: numbered[2],
            start: lineStart,
            end: next,
          });
        }
      }
    }

    lineStart = next;
  }

  return headings;
}

export interface SectionNode {
  /** null for the document root */
  heading: Heading | null;
  start: number;
  end: number;
  /** Body between the heading line and the first subsection */
  body: TextSpan;
  children: SectionNode[];
}

/**
 * Nest headings into a tree. A heading owns everything up to the next
 * heading of the same or a higher level.
 */
export function buildSectionTree(text: string, headings: Heading[]): SectionNode {
  const root: SectionNode = {
    heading: null,
    start: 0,
    end: text.length,
    body: { start: 0, end: text.length },
    children: [],
  };
  const stack: SectionNode[] = [root];
  const levelOf = (node: SectionNode): number => node.heading?.level ?? 0;

  for (const heading of headings) {
    while (stack.length > 1 && levelOf(stack[stack.length - 1]) >= heading.level) {
      const closed = stack.pop();
      if (closed) {
        closed.end = heading.start;
        if (closed.children.length === 0) closed.body.end = heading.start;
      }
    }
    const parent = stack[stack.length - 1];
    const node: SectionNode = {
      heading,
      start: heading.start,
      end: text.length,
      body: { start: heading.end, end: text.length },
      children: [],
    };
    if (parent.children.length === 0) {
      parent.body.end = heading.start;
    }
    parent.children.push(node);
    stack.push(node);
  }

  return root;
}

const TERMINATORS = '.!?';
const CLOSERS = '"\')]”’';

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

/**
 * Split [start, end) into sentence spans.
 *
 * A sentence ends at '.', '!' or '?' (plus closing quotes or brackets)
 * followed by whitespace, or at a line break. Leading whitespace joins the
 * following sentence; trailing whitespace of the range joins the last one.
 * A whitespace-only range yields no spans.
 */
export function splitSentences(text: string, start: number, end: number): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let spanStart = start;
  let hasContent = false;
  let i = start;

  while (i < end) {
    const ch = text[i];
    const isNewline = ch === '\n';
    let isBreak = isNewline;
    let j = i + 1;

    if (!isNewline && TERMINATORS.includes(ch)) {
      while (j < end && CLOSERS.includes(text[j])) j++;
      isBreak = j >= end || isSpace(text[j]);
    }

    if (!isBreak || !hasContent) {
      if (!isSpace(ch)) hasContent = true;
      i++;
      continue;
    }

    let newlines = isNewline ? 1 : 0;
    while (j < end && isSpace(text[j])) {
      if (text[j] === '\n') newlines++;
      j++;
    }
    spans.push({ start: spanStart, end: j, paragraphEnd: newlines >= 2 || j >= end });
    spanStart = j;
    hasContent = false;
    i = j;
  }

  if (spanStart < end) {
    if (hasContent) {
      spans.push({ start: spanStart, end, paragraphEnd: true });
    } else if (spans.length > 0) {
      const last = spans[spans.length - 1];
      last.end = end;
      last.paragraphEnd = true;
    }
  }

  return spans;
}
