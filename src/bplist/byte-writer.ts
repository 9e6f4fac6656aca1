const initialCapacity = 4096;

/**
 * Growable big-endian output buffer.
 */
export class ByteWriter {
  private _buffer = new Uint8Array(initialCapacity);
  private _view = new DataView(this._buffer.buffer);
  private _length = 0;

  get length() {
    return this._length;
  }

  private _ensure(byteLength: number) {
    if (this._length + byteLength <= this._buffer.byteLength) {
      return;
    }
    const next = new Uint8Array(Math.max(this._buffer.byteLength * 2, this._length + byteLength));
    next.set(this._buffer.subarray(0, this._length));
    this._buffer = next;
    this._view = new DataView(next.buffer);
  }

  writeUint8(value: number) {
    this._ensure(1);
    this._view.setUint8(this._length, value);
    this._length += 1;
  }

  writeBytes(bytes: Uint8Array) {
    this._ensure(bytes.byteLength);
    this._buffer.set(bytes, this._length);
    this._length += bytes.byteLength;
  }

  writeFloat64(value: number) {
    this._ensure(8);
    this._view.setFloat64(this._length, value);
    this._length += 8;
  }

  writeUint16(value: number) {
    this._ensure(2);
    this._view.setUint16(this._length, value);
    this._length += 2;
  }

  /**
   * Writes the low `byteLength` bytes of `value` in two's complement.
   */
  writeUIntBE(value: bigint | number, byteLength: number) {
    this._ensure(byteLength);
    let remaining = BigInt.asUintN(byteLength * 8, BigInt(value));
    for (let i = byteLength - 1; i >= 0; --i) {
      this._buffer[this._length + i] = Number(remaining & 0xFFn);
      remaining >>= 8n;
    }
    this._length += byteLength;
  }

  toUint8Array() {
    return this._buffer.slice(0, this._length);
  }
}
