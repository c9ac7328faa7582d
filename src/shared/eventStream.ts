/**
 * Server-sent events framing, both directions.
 */

export interface ServerSentEvent {
    event: string;
    data: string;
    id?: string;
}

/**
 * Formats one event. Multi-line data is split over several `data:` fields.
 */
export function formatEvent({ event, data, id }: ServerSentEvent): string {
    let frame = `event: ${event}\n`;
    if (id !== undefined) {
        frame += `id: ${id}\n`;
    }
    for (const line of data.split('\n')) {
        frame += `data: ${line}\n`;
    }
    return frame + '\n';
}

/**
 * Incremental parser for an event stream. Feed it decoded text as it arrives;
 * events are returned once their terminating blank line has been seen.
 */
export class EventStreamParser {
    private _buffer = '';
    private _event = '';
    private _data: string[] = [];
    private _id?: string;

    feed(text: string): ServerSentEvent[] {
        this._buffer += text;
        const lines = this._buffer.split('\n');
        this._buffer = lines.pop() ?? '';

        const events: ServerSentEvent[] = [];
        for (const raw of lines) {
            const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
            if (line === '') {
                const event = this._dispatch();
                if (event) {
                    events.push(event);
                }
                continue;
            }
            if (line.startsWith(':')) {
                // comment / keep-alive
                continue;
            }
            const colon = line.indexOf(':');
            const field = colon === -1 ? line : line.slice(0, colon);
            let value = colon === -1 ? '' : line.slice(colon + 1);
            if (value.startsWith(' ')) {
                value = value.slice(1);
            }
            switch (field) {
                case 'event':
                    this._event = value;
                    break;
                case 'data':
                    this._data.push(value);
                    break;
                case 'id':
                    this._id = value;
                    break;
            }
        }
        return events;
    }

    private _dispatch(): ServerSentEvent | undefined {
        if (this._data.length === 0) {
            this._event = '';
            return undefined;
        }
        const event: ServerSentEvent = { event: this._event || 'message', data: this._data.join('\n') };
        if (this._id !== undefined) {
            event.id = this._id;
        }
        this._event = '';
        this._data = [];
        return event;
    }
}
