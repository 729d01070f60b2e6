const SP = 0x20;
const TAB = 0x09;
const CR = 0x0d;
const LF = 0x0a;
const OPEN_BRACKET = '['.charCodeAt(0);
const CLOSE_BRACKET = ']'.charCodeAt(0);
const DOUBLE_QUOTE = '"'.charCodeAt(0);
const BACKSLASH = '\\'.charCodeAt(0);
const POUND = '#'.charCodeAt(0);
const SEMICOLON = ';'.charCodeAt(0);
const EQUAL = '='.charCodeAt(0);
const EOF = -1;

/**
 * Parses git-config style files into `section[.subsection].name -> values`.
 * Section and variable names are case-insensitive and normalized to lowercase; subsection names keep their case.
 * A variable without `=` is boolean `true`.
 */
export function parseConfig(binary: Uint8Array): Map<string, string[]> {
  const result = new Map<string, string[]>();
  let section: string | undefined;
  let i = 0;
  let line = 1;

  try {
    while (i < binary.length) {
      parseLine();
      line++;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config parsing failed at line ${line}: ${message}`);
  }

  return result;

  function peek(): number {
    return i < binary.length ? binary[i] : EOF;
  }

  function pop(): number {
    if (i >= binary.length) {
      throw new Error('Unexpected end of file');
    }

    return binary[i++];
  }

  function expect(c: number) {
    const actual = pop();
    if (actual !== c) {
      throw new Error(`Expected '${String.fromCharCode(c)}', found '${String.fromCharCode(actual)}'`);
    }
  }

  function skipWhitespace() {
    while (peek() === SP || peek() === TAB) {
      pop();
    }
  }

  function parseLine() {
    skipWhitespace();
    const c = peek();
    if (c === OPEN_BRACKET) {
      section = parseSection();
    } else if (c !== POUND && c !== SEMICOLON && c !== CR && c !== LF && c !== EOF) {
      const name = parseName();
      if (section === undefined) {
        throw new Error(`Variable '${name}' is defined outside of a section`);
      }

      skipWhitespace();
      let value = 'true';
      if (peek() === EQUAL) {
        pop();
        skipWhitespace();
        value = peek() === DOUBLE_QUOTE ? parseQuoted() : parseUnquoted();
      }

      const fullName = `${section}.${name}`;
      const values = result.get(fullName) ?? [];
      values.push(value);
      result.set(fullName, values);
    }

    // Rest of the line is either a comment or nothing at all
    skipWhitespace();
    if (peek() === POUND || peek() === SEMICOLON) {
      while (peek() !== LF && peek() !== EOF) {
        pop();
      }
    }
    if (peek() === CR) {
      pop();
    }
    if (peek() !== EOF) {
      expect(LF);
    }
  }

  function parseSection(): string {
    expect(OPEN_BRACKET);
    let name = '';
    while (peek() !== SP && peek() !== CLOSE_BRACKET) {
      const c = pop();
      if (!isAlphanumeric(c) && c !== 0x2d && c !== 0x2e) {
        throw new Error(`Invalid character '${String.fromCharCode(c)}' in section name`);
      }
      name += String.fromCharCode(c);
    }

    name = name.toLowerCase();
    if (peek() === SP) {
      skipWhitespace();
      name += `.${parseQuoted()}`;
    }

    expect(CLOSE_BRACKET);
    return name;
  }

  function parseName(): string {
    let name = '';
    while (isAlphanumeric(peek()) || peek() === 0x2d) {
      name += String.fromCharCode(pop());
    }
    if (name === '') {
      throw new Error(`Invalid character '${String.fromCharCode(peek())}' in variable name`);
    }

    return name.toLowerCase();
  }

  function parseQuoted(): string {
    expect(DOUBLE_QUOTE);
    let value = '';
    while (peek() !== DOUBLE_QUOTE) {
      let c = pop();
      if (c === CR || c === LF) {
        throw new Error('Unterminated quoted value');
      }
      if (c === BACKSLASH) {
        c = pop();
        value += c === 0x6e ? '\n' : c === 0x74 ? '\t' : String.fromCharCode(c);
      } else {
        value += String.fromCharCode(c);
      }
    }

    expect(DOUBLE_QUOTE);
    return value;
  }

  function parseUnquoted(): string {
    let value = '';
    while (![CR, LF, POUND, SEMICOLON, EOF].includes(peek())) {
      value += String.fromCharCode(pop());
    }

    return value.trim();
  }
}

function isAlphanumeric(c: number): boolean {
  return (c >= 0x30 && c <= 0x39) || (c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a);
}

/**
 * Inverse of `parseConfig` for flat `section.name -> value` maps (no subsections).
 */
export function encodeConfig(values: ReadonlyMap<string, string>, header?: string[]): string {
  const sections = new Map<string, [name: string, value: string][]>();
  for (const [fullName, value] of values) {
    const dot = fullName.indexOf('.');
    if (dot <= 0 || fullName.indexOf('.', dot + 1) >= 0) {
      throw new Error(`Invalid config name '${fullName}'`);
    }

    const section = fullName.substring(0, dot);
    const variables = sections.get(section) ?? [];
    variables.push([fullName.substring(dot + 1), value]);
    sections.set(section, variables);
  }

  const lines = (header ?? []).map(line => `# ${line}`);
  for (const [section, variables] of sections) {
    lines.push(`[${section}]`);
    for (const [name, value] of variables) {
      lines.push(`\t${name} = ${/^[\w.+-]*$/.test(value) ? value : JSON.stringify(value)}`);
    }
  }

  return lines.join('\n') + '\n';
}
