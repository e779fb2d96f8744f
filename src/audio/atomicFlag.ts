/**
 * Boolean shared between the playback producer and the capture consumer.
 * Backed by a SharedArrayBuffer so the producer can live in a worker.
 */
export class AtomicFlag {
  private readonly cell: Int32Array;

  constructor(initial = false, buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.cell = new Int32Array(buffer, 0, 1);
    if (initial) {
      this.set();
    }
  }

  get buffer(): SharedArrayBuffer {
    const { buffer } = this.cell;
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new TypeError('AtomicFlag storage is not shared');
    }
    return buffer;
  }

  set() {
    Atomics.store(this.cell, 0, 1);
  }

  clear() {
    Atomics.store(this.cell, 0, 0);
  }

  isSet(): boolean {
    return Atomics.load(this.cell, 0) === 1;
  }
}
