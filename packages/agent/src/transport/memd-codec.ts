/**
 * Binary protocol packet codec
 *
 * Every packet is a 24-byte header followed by extras, key and value:
 *
 * ```
 *  0      1       2-3      4        5         6-7            8-11      12-15   16-23
 * magic opcode keyLength extLength datatype vbucket|status bodyLength opaque   cas
 * ```
 *
 * Multi-byte fields are big-endian. `bodyLength` covers extras, key and
 * value.
 *
 * @packageDocumentation
 */

import { ProtocolError } from '../errors/index.js';

export const HEADER_SIZE = 24;

/** Packets larger than this are treated as a corrupt stream */
export const MAX_BODY_SIZE = 32 * 1024 * 1024;

export enum Magic {
  REQUEST = 0x80,
  RESPONSE = 0x81,
}

export enum Opcode {
  GET = 0x00,
  SET = 0x01,
  DELETE = 0x04,
  NOOP = 0x0a,
  HELLO = 0x1f,
  SASL_AUTH = 0x21,
  SELECT_BUCKET = 0x89,
  GET_CLUSTER_CONFIG = 0xb5,
}

export enum Datatype {
  RAW = 0x00,
  JSON = 0x01,
}

/**
 * A decoded (or to-be-encoded) packet. `status` is only meaningful for
 * responses, `vbucket` only for requests; both share header bytes 6-7.
 */
export interface MemdPacket {
  magic: Magic;
  opcode: number;
  datatype: number;
  vbucket: number;
  status: number;
  opaque: number;
  cas: bigint;
  extras: Buffer;
  key: Buffer;
  value: Buffer;
}

const EMPTY = Buffer.alloc(0);

/**
 * Request packet with defaults for everything but the opcode.
 */
export function createRequest(opcode: Opcode, fields: Partial<Omit<MemdPacket, 'magic' | 'opcode'>> = {}): MemdPacket {
  return {
    magic: Magic.REQUEST,
    opcode,
    datatype: fields.datatype ?? Datatype.RAW,
    vbucket: fields.vbucket ?? 0,
    status: 0,
    opaque: fields.opaque ?? 0,
    cas: fields.cas ?? 0n,
    extras: fields.extras ?? EMPTY,
    key: fields.key ?? EMPTY,
    value: fields.value ?? EMPTY,
  };
}

export function encodePacket(packet: MemdPacket): Buffer {
  const bodyLength = packet.extras.length + packet.key.length + packet.value.length;
  const out = Buffer.alloc(HEADER_SIZE + bodyLength);

  out.writeUInt8(packet.magic, 0);
  out.writeUInt8(packet.opcode, 1);
  out.writeUInt16BE(packet.key.length, 2);
  out.writeUInt8(packet.extras.length, 4);
  out.writeUInt8(packet.datatype, 5);
  out.writeUInt16BE(packet.magic === Magic.REQUEST ? packet.vbucket : packet.status, 6);
  out.writeUInt32BE(bodyLength, 8);
  out.writeUInt32BE(packet.opaque >>> 0, 12);
  out.writeBigUInt64BE(packet.cas, 16);

  let offset = HEADER_SIZE;
  offset += packet.extras.copy(out, offset);
  offset += packet.key.copy(out, offset);
  packet.value.copy(out, offset);
  return out;
}

/**
 * Reassembles packets from arbitrarily split stream chunks.
 */
export class MemdFrameDecoder {
  private pending: Buffer = EMPTY;

  /** Bytes received but not yet part of a complete packet */
  get bufferedBytes(): number {
    return this.pending.length;
  }

  /**
   * @throws ProtocolError on a bad magic byte or an oversized body
   */
  push(chunk: Buffer): MemdPacket[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const packets: MemdPacket[] = [];

    while (this.pending.length >= HEADER_SIZE) {
      const header = this.pending;
      const magic = header.readUInt8(0);
      if (magic !== Magic.REQUEST && magic !== Magic.RESPONSE) {
        throw new ProtocolError(`invalid packet magic 0x${magic.toString(16)}`);
      }
      const bodyLength = header.readUInt32BE(8);
      if (bodyLength > MAX_BODY_SIZE) {
        throw new ProtocolError(`packet body of ${bodyLength} bytes exceeds limit`);
      }
      if (this.pending.length < HEADER_SIZE + bodyLength) {
        break;
      }

      const keyLength = header.readUInt16BE(2);
      const extrasLength = header.readUInt8(4);
      if (extrasLength + keyLength > bodyLength) {
        throw new ProtocolError('packet key and extras exceed body length');
      }
      const frame = Buffer.from(this.pending.subarray(0, HEADER_SIZE + bodyLength));
      this.pending = this.pending.subarray(HEADER_SIZE + bodyLength);

      const field67 = frame.readUInt16BE(6);
      const extrasEnd = HEADER_SIZE + extrasLength;
      const keyEnd = extrasEnd + keyLength;
      packets.push({
        magic: magic === Magic.REQUEST ? Magic.REQUEST : Magic.RESPONSE,
        opcode: frame.readUInt8(1),
        datatype: frame.readUInt8(5),
        vbucket: magic === Magic.REQUEST ? field67 : 0,
        status: magic === Magic.RESPONSE ? field67 : 0,
        opaque: frame.readUInt32BE(12),
        cas: frame.readBigUInt64BE(16),
        extras: frame.subarray(HEADER_SIZE, extrasEnd),
        key: frame.subarray(extrasEnd, keyEnd),
        value: frame.subarray(keyEnd),
      });
    }

    if (this.pending.length === 0) {
      this.pending = EMPTY;
    }
    return packets;
  }
}
