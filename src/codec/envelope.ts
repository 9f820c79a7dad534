import {
  AIR_TRACK_KIND,
  decodeAirTrack,
  encodeAirTrack,
  type AirTrackReport,
} from './airTrack';
import {
  ShortBufferError,
  UnsupportedKindError,
  toCodecResult,
  type CodecResult,
} from './errors';

export interface AirTrackMessage {
  readonly kind: 'airTrack';
  readonly report: AirTrackReport;
}

// Add new variants here and register a codec for each.
export type Message = AirTrackMessage;

export type MessageKind = Message['kind'];

/**
 * Capability pair for one message kind. The envelope owns the tag byte;
 * codecs only see the body.
 */
export interface MessageCodec<M extends Message = Message> {
  readonly kind: M['kind'];
  readonly tag: number;
  encodeBody(message: M): Uint8Array;
  decodeBody(body: Uint8Array): M;
}

export const airTrackCodec: MessageCodec<AirTrackMessage> = {
  kind: 'airTrack',
  tag: AIR_TRACK_KIND,
  encodeBody: (message) => encodeAirTrack(message.report),
  decodeBody: (body) => ({ kind: 'airTrack', report: decodeAirTrack(body) }),
};

export class MessageRegistry {
  private byTag = new Map<number, MessageCodec>();

  private byKind = new Map<MessageKind, MessageCodec>();

  register(codec: MessageCodec): this {
    if (!Number.isInteger(codec.tag) || codec.tag < 0 || codec.tag > 0xFF) {
      throw new RangeError(`message tag must be a single byte, got ${codec.tag}`);
    }
    if (this.byTag.has(codec.tag)) {
      throw new Error(`message tag 0x${codec.tag.toString(16)} is already registered`);
    }
    if (this.byKind.has(codec.kind)) {
      throw new Error(`message kind ${codec.kind} is already registered`);
    }
    this.byTag.set(codec.tag, codec);
    this.byKind.set(codec.kind, codec);
    return this;
  }

  tags(): number[] {
    return Array.from(this.byTag.keys());
  }

  encode(message: Message): Uint8Array {
    const codec = this.byKind.get(message.kind);
    if (!codec) {
      throw new UnsupportedKindError(message.kind);
    }
    const body = codec.encodeBody(message);
    const out = new Uint8Array(1 + body.length);
    out[0] = codec.tag;
    out.set(body, 1);
    return out;
  }

  decode(buf: Uint8Array): Message {
    if (buf.length === 0) {
      throw new ShortBufferError(8, 0);
    }
    const tag = buf[0];
    const codec = this.byTag.get(tag);
    if (!codec) {
      throw new UnsupportedKindError(tag);
    }
    return codec.decodeBody(buf.subarray(1));
  }
}

export const defaultRegistry = new MessageRegistry().register(airTrackCodec);

export function encodeMessage(message: Message, registry: MessageRegistry = defaultRegistry): Uint8Array {
  return registry.encode(message);
}

export function decodeMessage(buf: Uint8Array, registry: MessageRegistry = defaultRegistry): Message {
  return registry.decode(buf);
}

export function tryEncodeMessage(
  message: Message,
  registry: MessageRegistry = defaultRegistry,
): CodecResult<Uint8Array> {
  return toCodecResult(() => registry.encode(message));
}

export function tryDecodeMessage(
  buf: Uint8Array,
  registry: MessageRegistry = defaultRegistry,
): CodecResult<Message> {
  return toCodecResult(() => registry.decode(buf));
}
