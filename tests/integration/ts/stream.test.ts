/**
 * End-to-end tests: items streamed through Writer and CborEncoder must produce
 * the same bytes a one-shot CBOR encoder would, and must decode back with
 * cbor-x.
 */

import { describe, it, expect } from 'vitest';
import { Decoder } from 'cbor-x';
import {
  BufferSink,
  CborEncoder,
  MapWriter,
  StreamSink,
  type ValueWriter,
  Writer,
  WriterProtocolError,
  marshal,
} from '../../../typescript/src';

/** A definite-length array. */
class Fixed {
  constructor(readonly items: Item[]) {}
}

/** A definite-length map. */
class FixedMap {
  constructor(readonly entries: Record<string, Item>) {}
}

/** Plain arrays and objects are written as indefinite containers. */
type Item = number | string | Fixed | FixedMap | Item[] | { [key: string]: Item };

function writeItem(writer: ValueWriter, item: Item): void {
  if (item instanceof Fixed) {
    const items = item.items;
    writer.array(items.length).use((a) => items.forEach((i) => writeItem(a, i)));
  } else if (item instanceof FixedMap) {
    const entries = item.entries;
    const keys = Object.keys(entries).sort();
    writer.map(keys.length).use((m) => keys.forEach((k) => writeEntry(m, k, entries[k])));
  } else if (Array.isArray(item)) {
    const items = item;
    writer.array().use((a) => items.forEach((i) => writeItem(a, i)));
  } else if (typeof item === 'object') {
    const entries = item;
    const keys = Object.keys(entries).sort();
    writer.map().use((m) => keys.forEach((k) => writeEntry(m, k, entries[k])));
  } else {
    writer.write(item);
  }
}

function writeEntry(writer: MapWriter, key: string, item: Item): void {
  if (item instanceof Fixed) {
    const items = item.items;
    writer.array(key, items.length).use((a) => items.forEach((i) => writeItem(a, i)));
  } else if (item instanceof FixedMap) {
    const entries = item.entries;
    const keys = Object.keys(entries).sort();
    writer.map(key, keys.length).use((m) => keys.forEach((k) => writeEntry(m, k, entries[k])));
  } else if (Array.isArray(item)) {
    const items = item;
    writer.array(key).use((a) => items.forEach((i) => writeItem(a, i)));
  } else if (typeof item === 'object') {
    const entries = item;
    const keys = Object.keys(entries).sort();
    writer.map(key).use((m) => keys.forEach((k) => writeEntry(m, k, entries[k])));
  } else {
    writer.write(key, item);
  }
}

function encodeItem(item: Item): string {
  return Buffer.from(marshal(item, writeItem)).toString('hex');
}

describe('streamed containers', () => {
  describe('arrays', () => {
    it.each<[string, Item, string]>([
      ['fixed array of one', new Fixed([1]), '8101'],
      ['fixed array', new Fixed([1, 2, 3]), '83010203'],
      ['variable array', [1, 2, 3, 4], '9f01020304ff'],
      ['nested fixed arrays', new Fixed([1, new Fixed([2, 3]), new Fixed([4, 5])]), '8301820203820405'],
      ['nested variable arrays', [1, [2, 3], [4, 5]], '9f019f0203ff9f0405ffff'],
      ['nested mixed arrays', [1, new Fixed([2, 3]), new Fixed([4, 5])], '9f01820203820405ff'],
    ])('encodes a %s', (_name, item, expected) => {
      expect(encodeItem(item)).toBe(expected);
    });

    it('uses a 1-byte count for 24 elements', () => {
      const items = Array.from({ length: 24 }, (_, i) => i);
      const expected = '9818' + items.map((i) => i.toString(16).padStart(2, '0')).join('');
      expect(encodeItem(new Fixed(items))).toBe(expected);
    });
  });

  describe('maps', () => {
    it.each<[string, Item, string]>([
      ['fixed map', new FixedMap({ a: 1 }), 'a1616101'],
      ['variable map', { a: 1 }, 'bf616101ff'],
      ['nested fixed map', new FixedMap({ a: 1, b: new FixedMap({ c: 2 }) }), 'a26161016162a1616302'],
      ['nested variable map', { a: 1, b: { c: 2 } }, 'bf6161016162bf616302ffff'],
      ['variable map holding a fixed array', { a: new Fixed([1, 2, 3]) }, 'bf616183010203ff'],
      ['variable array holding a fixed map', [1, 2, new FixedMap({ a: 1 })], '9f0102a1616101ff'],
    ])('encodes a %s', (_name, item, expected) => {
      expect(encodeItem(item)).toBe(expected);
    });
  });

  describe('decoding with cbor-x', () => {
    const decoder = new Decoder({ mapsAsObjects: true });

    it('reads back nested mixed arrays', () => {
      const data = marshal([1, new Fixed([2, 3]), [4, 5]], writeItem);
      expect(decoder.decode(data)).toEqual([1, [2, 3], [4, 5]]);
    });

    it('reads back nested maps', () => {
      const data = marshal({ a: new Fixed([1, 2]), b: new FixedMap({ c: 'd' }) }, writeItem);
      expect(decoder.decode(data)).toEqual({ a: [1, 2], b: { c: 'd' } });
    });
  });

  describe('sinks', () => {
    it('streams the same bytes as a buffer', () => {
      const item: Item = [1, new FixedMap({ k: [2, 3] }), 'x'];
      const chunks: Uint8Array[] = [];
      const streamSink = new StreamSink({ write: (chunk) => chunks.push(chunk) });

      writeItem(new Writer(new CborEncoder({ sink: streamSink })), item);

      const bufferSink = new BufferSink();
      writeItem(new Writer(new CborEncoder({ sink: bufferSink })), item);

      expect(Buffer.concat(chunks).toString('hex')).toBe(Buffer.from(bufferSink.bytes()).toString('hex'));
      expect(streamSink.position).toBe(bufferSink.position);
    });

    it('writes several top-level items back to back', () => {
      const encoder = new CborEncoder();
      const writer = new Writer(encoder);
      writer.write(1);
      writer.array(0).use(() => {});
      writer.map().use((m) => m.write('a', true));

      expect(Buffer.from(encoder.bytes()).toString('hex')).toBe('0180bf6161f5ff');
    });
  });

  describe('protocol errors', () => {
    it('stops before writing a surplus element', () => {
      const encoder = new CborEncoder();
      const writer = new Writer(encoder);

      expect(() =>
        writer.array(1).use((a) => {
          a.write(1);
          a.write(2);
        })
      ).toThrow(WriterProtocolError);
      expect(Buffer.from(encoder.bytes()).toString('hex')).toBe('8101');
    });

    it('terminates an indefinite map even when the body fails', () => {
      const encoder = new CborEncoder();
      const writer = new Writer(encoder);

      expect(() =>
        writer.map().use((m) => {
          m.write('a', 1);
          throw new Error('producer failed');
        })
      ).toThrow('producer failed');
      expect(Buffer.from(encoder.bytes()).toString('hex')).toBe('bf616101ff');
    });
  });
});
