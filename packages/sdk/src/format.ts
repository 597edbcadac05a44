/**
 * Message formatting: status prefix, header and CRLF normalization
 * composed inside fixed-capacity buffers.
 *
 * A MessageFormatter owns its buffers and reuses them on every call, so
 * formatting a message allocates nothing beyond the rendered string.
 */

import type { ChannelPolicy } from './channels.js';
import { ContractViolationError } from './errors.js';

/** Capacity of each formatting buffer, in bytes */
export const LOG_BUFFER_SIZE = 2048;

/** Longest status prefix, in bytes, before the ": " separator */
export const MAX_STATUS_SIZE = 1024;

/** Largest formatted message; one slot of the buffer stays reserved */
export const MAX_MESSAGE_SIZE = LOG_BUFFER_SIZE - 1;

const CR = 0x0d;
const LF = 0x0a;
const STATUS_SEPARATOR = ': ';

// ─── Bounded Writer ───────────────────────────────────────────────────────────

/**
 * Largest cut point <= end that does not fall inside a UTF-8 sequence.
 */
export function utf8Boundary(bytes: Uint8Array, end: number): number {
	let cut = Math.min(end, bytes.length);
	while (cut > 0 && cut < bytes.length && (bytes[cut] & 0xc0) === 0x80) {
		cut--;
	}
	return cut;
}

/**
 * A cursor over a fixed-length byte region. Writes past the capacity are
 * refused; every write reports how many bytes it accepted.
 */
export class BoundedWriter {
	private readonly buffer: Buffer;
	private cursor = 0;

	constructor(readonly capacity: number) {
		this.buffer = Buffer.alloc(capacity);
	}

	get length(): number {
		return this.cursor;
	}

	get remaining(): number {
		return this.capacity - this.cursor;
	}

	reset(): void {
		this.cursor = 0;
	}

	/** Drop everything past `length` bytes. */
	truncate(length: number): void {
		this.cursor = Math.max(0, Math.min(length, this.cursor));
	}

	writeByte(byte: number): number {
		if (this.cursor >= this.capacity) return 0;
		this.buffer[this.cursor++] = byte;
		return 1;
	}

	/** Copy up to maxLength bytes of source without splitting a UTF-8 sequence. */
	writeBytes(source: Uint8Array, maxLength = source.length): number {
		const wanted = Math.min(source.length, maxLength, this.remaining);
		const count = wanted < source.length ? utf8Boundary(source, wanted) : wanted;
		this.buffer.set(source.subarray(0, count), this.cursor);
		this.cursor += count;
		return count;
	}

	/** Encode up to maxLength bytes of text as UTF-8; partial characters are never written. */
	writeString(text: string, maxLength = Number.POSITIVE_INFINITY): number {
		const limit = Math.min(maxLength, this.remaining);
		if (limit <= 0 || text.length === 0) return 0;
		const count = this.buffer.write(text, this.cursor, limit, 'utf8');
		this.cursor += count;
		return count;
	}

	/** View of the written bytes. Valid until the next write or reset. */
	view(): Uint8Array {
		return this.buffer.subarray(0, this.cursor);
	}

	toString(): string {
		return this.buffer.toString('utf8', 0, this.cursor);
	}
}

// ─── Line endings ─────────────────────────────────────────────────────────────

/**
 * Copy source into out, inserting CR before every LF that is neither the
 * first byte nor already preceded by CR. Stops when out is full; a CRLF
 * pair is never split and a UTF-8 sequence is never cut.
 */
export function normalizeInto(source: Uint8Array, out: BoundedWriter): number {
	out.reset();
	for (let i = 0; i < source.length; i++) {
		const byte = source[i];
		const needsCr = byte === LF && i > 0 && source[i - 1] !== CR;
		if (out.remaining < (needsCr ? 2 : 1)) {
			// Bytes between the boundary and i are one partial character; none is CR or LF.
			out.truncate(out.length - (i - utf8Boundary(source, i)));
			break;
		}
		if (needsCr) out.writeByte(CR);
		out.writeByte(byte);
	}
	return out.length;
}

/** String form of the line-ending pass, without a size cap. */
export function normalizeLineEndings(text: string): string {
	const source = Buffer.from(text, 'utf8');
	const out = new BoundedWriter(Math.max(1, source.length * 2));
	normalizeInto(source, out);
	return out.toString();
}

// ─── Formatter ────────────────────────────────────────────────────────────────

export class MessageFormatter {
	private readonly rendered = new BoundedWriter(LOG_BUFFER_SIZE);
	private readonly normalized = new BoundedWriter(MAX_MESSAGE_SIZE);
	private readonly output = new BoundedWriter(MAX_MESSAGE_SIZE);

	/**
	 * Produce the bytes a channel emits for an already rendered message.
	 *
	 * The result is a view on this formatter's buffer and is overwritten by
	 * the next call. Throws ContractViolationError when the rendered text is
	 * LOG_BUFFER_SIZE bytes or longer.
	 */
	format(rendered: string, policy: ChannelPolicy, status: string): Uint8Array {
		const size = Buffer.byteLength(rendered, 'utf8');
		if (size >= LOG_BUFFER_SIZE) {
			throw new ContractViolationError(
				`Formatted message is ${size} bytes; messages must stay under ${LOG_BUFFER_SIZE}`,
			);
		}

		this.rendered.reset();
		this.rendered.writeString(rendered);
		normalizeInto(this.rendered.view(), this.normalized);

		const out = this.output;
		out.reset();
		if (policy.addStatusPrefix && status.length > 0) {
			out.writeString(status, MAX_STATUS_SIZE);
			out.writeString(STATUS_SEPARATOR);
		}
		out.writeString(policy.header);

		const body = this.normalized.view();
		let room = Math.min(body.length, out.remaining);
		if (room > 0 && room < body.length && body[room - 1] === CR && body[room] === LF) {
			room--;
		}
		out.writeBytes(body, room);
		return out.view();
	}
}

// ─── Timestamps ───────────────────────────────────────────────────────────────

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number): string {
	return String(n).padStart(2, '0');
}

/**
 * Fixed-width local timestamp, `Www Mmm dd hh:mm:ss yyyy\n` (25 bytes).
 * The day of month is space padded.
 */
export function formatAsctime(date: Date): string {
	const day = String(date.getDate()).padStart(2, ' ');
	const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
	return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}\n`;
}
