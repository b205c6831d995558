export interface SseMessage {
  event?: string;
  data?: string;
  id?: string;
}

/**
 * Incremental `text/event-stream` decoder. Feed it decoded text chunks; it
 * returns every message completed by that chunk.
 */
export class SseDecoder {
  private buffer = '';
  private current: SseMessage = {};

  push(chunk: string): SseMessage[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    const messages: SseMessage[] = [];
    for (const rawLine of lines) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

      if (line === '') {
        if (this.current.data !== undefined) {
          messages.push(this.current);
        }
        this.current = {};
        continue;
      }

      // Comment / heartbeat
      if (line.startsWith(':')) continue;

      const colonIdx = line.indexOf(':');
      const field = colonIdx === -1 ? line : line.slice(0, colonIdx);
      let value = colonIdx === -1 ? '' : line.slice(colonIdx + 1);
      if (value.startsWith(' ')) value = value.slice(1);

      switch (field) {
        case 'event':
          this.current.event = value;
          break;
        case 'data':
          this.current.data = this.current.data === undefined ? value : `${this.current.data}\n${value}`;
          break;
        case 'id':
          this.current.id = value;
          break;
      }
    }
    return messages;
  }
}
