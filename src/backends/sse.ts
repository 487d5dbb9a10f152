/**
 * Incremental parser for `text/event-stream` bodies. Feed decoded text with
 * `push`; every complete event's joined `data:` lines are returned.
 */
export class SseParser {
  private buffer = ''
  private dataLines: string[] = []

  push(text: string): string[] {
    this.buffer += text
    const events: string[] = []

    for (;;) {
      const lineBreakIndex = this.buffer.indexOf('\n')
      if (lineBreakIndex < 0) break
      let line = this.buffer.slice(0, lineBreakIndex)
      this.buffer = this.buffer.slice(lineBreakIndex + 1)
      if (line.endsWith('\r')) line = line.slice(0, -1)

      if (!line) {
        const event = this.flushEvent()
        if (event !== undefined) events.push(event)
        continue
      }
      if (line.startsWith(':')) continue
      if (line.startsWith('data:')) this.dataLines.push(line.slice(5).trimStart())
    }

    return events
  }

  // Emits whatever is left once the body has ended
  end(): string[] {
    const tail = this.buffer.trim()
    this.buffer = ''
    if (tail.startsWith('data:')) this.dataLines.push(tail.slice(5).trimStart())
    const event = this.flushEvent()
    return event === undefined ? [] : [event]
  }

  private flushEvent(): string | undefined {
    if (this.dataLines.length === 0) return undefined
    const payload = this.dataLines.join('\n').trim()
    this.dataLines = []
    return payload || undefined
  }
}
