// ============================================================================
// TutorPath — Model output cleanup
// Fence/control-character stripping, outermost-object extraction and a
// string-aware scanner that escapes raw line breaks inside JSON string literals.
// ============================================================================

type ScanState = 'outside' | 'string' | 'escape';

const FENCE_RE = /```(?:json)?\s*/gi;
// C0 controls except \t \n \r, plus DEL
const CONTROL_RE = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

const STRING_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

export function stripCodeFences(text: string): string {
  return text.replace(FENCE_RE, '');
}

export function stripControlCharacters(text: string): string {
  return text.replace(CONTROL_RE, '');
}

/**
 * Escapes newline, carriage return and tab characters that appear inside
 * string literals. Structural whitespace between tokens is left alone, and
 * an escape sequence already present in a string is copied through.
 */
export function escapeStringControls(text: string): string {
  let state: ScanState = 'outside';
  let out = '';

  for (const ch of text) {
    switch (state) {
      case 'outside':
        if (ch === '"') state = 'string';
        out += ch;
        break;
      case 'string':
        if (ch === '\\') {
          state = 'escape';
          out += ch;
        } else if (ch === '"') {
          state = 'outside';
          out += ch;
        } else {
          out += STRING_ESCAPES[ch] ?? ch;
        }
        break;
      case 'escape':
        state = 'string';
        out += ch;
        break;
    }
  }

  return out;
}

/** Span from the first `{` to the last `}`, or null when there is none. */
export function extractOutermostObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) return null;
  return text.slice(start, end + 1);
}

/**
 * Parseable JSON text for the object embedded in a model reply, or null when
 * the reply holds no object. The scanner only sees the extracted span, so
 * quotes in surrounding prose cannot flip its string state.
 */
export function cleanModelJson(raw: string): string | null {
  const span = extractOutermostObject(stripControlCharacters(stripCodeFences(raw)));
  return span === null ? null : escapeStringControls(span);
}
