/**
 * Canonical text for Python literals, so equal values share a histogram key
 * however they were spelled. Strings are re-quoted the way `repr` prints them.
 */

const STRING_TOKEN = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

const KEYWORDS = new Set(["True", "False", "None", "..."]);

const NUMBER = /^[+-]?(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d+)?[jJ]?$|^[+-]?0[xXoObB][\dA-Fa-f_]+$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

export interface StringValue {
  bytes: boolean;
  value: string;
}

/**
 * Decoded value of one string token, or null for f-strings and text that is
 * not a string token.
 */
export function parseStringToken(text: string): StringValue | null {
  const match = STRING_TOKEN.exec(text);
  if (!match) {
    return null;
  }
  const prefix = match[1].toLowerCase();
  if (prefix.includes("f") || /[^rbu]/.test(prefix)) {
    return null;
  }
  const content = match[3];
  return {
    bytes: prefix.includes("b"),
    value: prefix.includes("r") ? content : decodeEscapes(content),
  };
}

function decodeEscapes(content: string): string {
  return content.replace(
    /\\(\r\n|\n|[0-7]{1,3}|x[\dA-Fa-f]{2}|u[\dA-Fa-f]{4}|U[\dA-Fa-f]{8}|[\s\S])/g,
    (escape: string, body: string) => {
      if (body === "\n" || body === "\r\n") return "";
      if (Object.hasOwn(SIMPLE_ESCAPES, body)) return SIMPLE_ESCAPES[body];
      if (/^[0-7]+$/.test(body)) return String.fromCodePoint(parseInt(body, 8));
      if (/^[xuU]./.test(body)) return String.fromCodePoint(parseInt(body.slice(1), 16));
      // Unknown escapes keep their backslash
      return escape;
    }
  );
}

/** `repr` of a str or bytes value. */
export function reprString({ bytes, value }: StringValue): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = "";
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    if (char === quote || char === "\\") out += `\\${char}`;
    else if (char === "\n") out += "\\n";
    else if (char === "\r") out += "\\r";
    else if (char === "\t") out += "\\t";
    else if (code < 0x20 || code === 0x7f || (bytes && code > 0x7f)) out += `\\x${code.toString(16).padStart(2, "0")}`;
    else out += char;
  }
  return `${bytes ? "b" : ""}${quote}${out}${quote}`;
}

/**
 * Canonical literal text for a default's source text, or null when the
 * default is not a literal (a call, a name, a container).
 */
export function normalizeLiteralText(source: string): string | null {
  const text = source.trim();
  if (KEYWORDS.has(text)) {
    return text;
  }
  if (NUMBER.test(text)) {
    return text.startsWith("+") ? text.slice(1) : text;
  }
  const string = parseStringToken(text);
  return string ? reprString(string) : null;
}
