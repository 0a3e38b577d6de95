import { tokenizeInline, type InlineDriverOptions, type InlineToken } from '../inline-driver.js';
import { INLINE_TOKEN_KIND_COUNT, InlineTokenKindShadow, tokenKindToString, type InlineTokenKind } from '../scanner/token-types.js';

/**
 * Annotated token verification.
 *
 * A test is markdown followed, under any line, by a position line of markers
 * (1-9 then A-Z, in order, each under the first character of a token) and one
 * `@<marker> Kind "text"` line per marker. The text part is optional; `Text`
 * names a plain text run.
 *
 * Returns the input unchanged when every assertion holds, otherwise the input
 * rewritten with what the tokenizer actually produced, so a failing
 * `expect(verifyTokens(test)).toBe(test)` shows a readable diff.
 */
export function verifyTokens(input: string, options?: InlineDriverOptions): string {
  const lines = input.split('\n');

  const markdownLines: string[] = [];
  const layout: ({ markdown: string } | AssertionBlock)[] = [];

  let markdownLength = 0;
  let lastLineStart = -1;
  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const markers = parsePositionLine(line);
    if (markers && lastLineStart >= 0 && i + 1 < lines.length && lines[i + 1].startsWith('@')) {
      const block: AssertionBlock = { lineStart: lastLineStart, markers, assertionLines: [] };
      i++;
      while (i < lines.length && lines[i].startsWith('@')) {
        block.assertionLines.push(lines[i]);
        i++;
      }
      layout.push(block);
      continue;
    }

    lastLineStart = markdownLength;
    markdownLength += line.length + 1;
    markdownLines.push(line);
    layout.push({ markdown: line });
    i++;
  }

  const markdown = markdownLines.join('\n');
  const tokens = tokenizeInline(markdown, options);

  const output: string[] = [];
  for (const entry of layout) {
    if ('markdown' in entry) {
      output.push(entry.markdown);
    } else {
      output.push(...renderBlock(entry, tokens));
    }
  }

  const rendered = output.join('\n');
  if (input.trimEnd() === rendered.trimEnd())
    return input;

  return rendered;
}

interface AssertionBlock {
  /** Offset of the annotated markdown line. */
  lineStart: number;
  markers: { label: string, lineOffset: number }[];
  assertionLines: string[];
}

function renderBlock(block: AssertionBlock, tokens: InlineToken[]): string[] {
  const assertions = new Map<string, { kind: InlineTokenKind | undefined, text: string | null, source: string }>();
  for (const line of block.assertionLines) {
    const parsed = parseAssertLine(line);
    if (parsed) assertions.set(parsed.label.toUpperCase(), parsed);
  }

  // One marker per token: the first marker falling on a token wins
  const markedTokens: { token: InlineToken, label: string }[] = [];
  for (const marker of block.markers) {
    const offset = block.lineStart + marker.lineOffset;
    const token = tokens.find(tk => tk.pos <= offset && offset < tk.end);
    if (!token || markedTokens.some(m => m.token === token)) continue;
    markedTokens.push({ token, label: marker.label.toUpperCase() });
  }
  markedTokens.sort((a, b) => a.token.pos - b.token.pos);

  let positionLine = '';
  const assertionLines: string[] = [];
  for (let emitted = 0; emitted < markedTokens.length; emitted++) {
    const { token, label } = markedTokens[emitted];
    const positionMarker = (emitted + 1) < 10 ? String(emitted + 1) :
      String.fromCharCode('A'.charCodeAt(0) + emitted - 9);

    const column = Math.max(0, token.pos - block.lineStart);
    while (positionLine.length < column)
      positionLine += ' ';
    positionLine += positionMarker;

    const assertion = assertions.get(label);
    if (!assertion) {
      assertionLines.push('@' + positionMarker + ' ' + tokenKindToString(token.kind));
      continue;
    }

    const kindMatch = assertion.kind === token.kind;
    const textMatch = assertion.text === null || assertion.text === token.text;
    if (kindMatch && textMatch) {
      assertionLines.push(assertion.source.replace(/^@[A-Za-z0-9]+/, '@' + positionMarker));
    } else {
      assertionLines.push(
        '@' + positionMarker + ' ' + tokenKindToString(token.kind) +
        (assertion.text === null ? '' : ' ' + JSON.stringify(token.text)));
    }
  }

  return [positionLine, ...assertionLines];
}

/** Markers must read 1, 2, ... 9, A, B ... in order, separated by spaces. */
function parsePositionLine(line: string) {
  if (!/^[\s1-9A-Za-z]*$/.test(line)) return;

  const markers: { label: string, lineOffset: number }[] = [];
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (/\s/.test(ch)) continue;
    markers.push({ label: ch, lineOffset: i });
  }
  if (!markers.length) return;

  for (let i = 0; i < markers.length; i++) {
    const expected = i < 9 ? String(i + 1) : String.fromCharCode('A'.charCodeAt(0) + i - 9);
    if (markers[i].label.toUpperCase() !== expected) return;
  }

  return markers;
}

function parseAssertLine(line: string) {
  const match = /^@([A-Za-z0-9]+)\s+([A-Za-z]+)(?:\s+(".*"))?\s*$/.exec(line);
  if (!match) return;

  const kind = convertTokenKind(match[2]);
  if (kind === null) return;

  let text: string | null = null;
  if (match[3] !== undefined) {
    try {
      const parsed: unknown = JSON.parse(match[3]);
      if (typeof parsed !== 'string') return;
      text = parsed;
    } catch {
      return;
    }
  }

  return { label: match[1], kind, text, source: line };
}

/** Resolves a kind name; `Text` is a plain text run (undefined), unknown names are null. */
function convertTokenKind(encoded: string): InlineTokenKind | undefined | null {
  if (encoded === 'Text') return undefined;
  for (let kind = 0; kind < INLINE_TOKEN_KIND_COUNT; kind++) {
    if (InlineTokenKindShadow[kind] === encoded) return kind;
  }
  return null;
}
