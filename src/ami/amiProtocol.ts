/**
 * Asterisk Manager Interface framing: CRLF-separated `Key: Value` lines,
 * one blank line between messages.
 */

export type AmiMessage = Record<string, string>;

export type AmiFieldValue = string | number | boolean | readonly string[] | undefined;

export type AmiAction = { Action: string } & Record<string, AmiFieldValue>;

const LINE_END = '\r\n';
const MESSAGE_END = '\r\n\r\n';

function formatValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  // A raw line break would end the field early.
  return String(value).replace(/[\r\n]+/g, ' ');
}

/** Serializes an action; array values repeat their key (e.g. `Variable`). */
export function serializeAction(action: AmiAction): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(action)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === 'object') {
      for (const item of value) {
        lines.push(`${key}: ${formatValue(item)}`);
      }
      continue;
    }
    lines.push(`${key}: ${formatValue(value)}`);
  }
  return `${lines.join(LINE_END)}${MESSAGE_END}`;
}

export function parseMessage(block: string): AmiMessage | undefined {
  const message: AmiMessage = {};
  let fields = 0;
  for (const line of block.split(LINE_END)) {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key === '') {
      continue;
    }
    message[key] = value;
    fields += 1;
  }
  return fields > 0 ? message : undefined;
}

/**
 * Incremental reader for the manager socket. The greeting line
 * (`Asterisk Call Manager/x.y`) is surfaced once through `banner`.
 */
export class AmiFrameParser {
  private buffer = '';
  private greeted = false;
  public banner?: string;

  public push(chunk: string): AmiMessage[] {
    this.buffer += chunk;

    if (!this.greeted) {
      const lineEnd = this.buffer.indexOf(LINE_END);
      if (lineEnd < 0) {
        return [];
      }
      this.banner = this.buffer.slice(0, lineEnd);
      this.buffer = this.buffer.slice(lineEnd + LINE_END.length);
      this.greeted = true;
    }

    const messages: AmiMessage[] = [];
    let end = this.buffer.indexOf(MESSAGE_END);
    while (end >= 0) {
      const block = this.buffer.slice(0, end);
      this.buffer = this.buffer.slice(end + MESSAGE_END.length);
      const message = parseMessage(block);
      if (message) {
        messages.push(message);
      }
      end = this.buffer.indexOf(MESSAGE_END);
    }
    return messages;
  }

  public reset(): void {
    this.buffer = '';
    this.greeted = false;
    this.banner = undefined;
  }
}

export function isResponse(message: AmiMessage): boolean {
  return message.Response !== undefined && message.Event === undefined;
}

export function isSuccess(message: AmiMessage): boolean {
  const response = message.Response?.toLowerCase();
  return response === 'success' || response === 'follows' || response === 'goodbye';
}
