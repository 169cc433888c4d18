import {
  applyMask,
  encodeCloseFrame,
  encodeFrame,
  encodeTextFrame,
  FrameDecodeError,
  FrameDecoder,
  Opcode,
} from './frame-codec';

describe('frame codec', () => {
  const clientMask = Buffer.from([0x37, 0xfa, 0x21, 0x3d]);

  describe('encodeFrame', () => {
    it('should write a short unmasked text frame with FIN set', () => {
      expect([...encodeTextFrame('hi')]).toEqual([0x81, 0x02, 0x68, 0x69]);
    });

    it('should use a 16-bit length for payloads from 126 bytes', () => {
      const frame = encodeFrame(Opcode.TEXT, Buffer.alloc(200, 0x61));

      expect([...frame.subarray(0, 4)]).toEqual([0x81, 126, 0x00, 0xc8]);
      expect(frame.length).toBe(204);
    });

    it('should use a 64-bit length for payloads from 65536 bytes', () => {
      const frame = encodeFrame(Opcode.TEXT, Buffer.alloc(100000, 0x61));

      expect([...frame.subarray(0, 10)]).toEqual([
        0x81, 127, 0, 0, 0, 0, 0x00, 0x01, 0x86, 0xa0,
      ]);
      expect(frame.length).toBe(100010);
    });

    it('should encode a close frame with a status code', () => {
      expect([...encodeCloseFrame(1000)]).toEqual([0x88, 0x02, 0x03, 0xe8]);
    });

    it('should encode an empty close frame', () => {
      expect([...encodeCloseFrame()]).toEqual([0x88, 0x00]);
    });

    it('should mask client frames like the RFC example', () => {
      const frame = encodeFrame(Opcode.TEXT, Buffer.from('Hello'), {
        mask: clientMask,
      });

      expect([...frame]).toEqual([
        0x81, 0x85, 0x37, 0xfa, 0x21, 0x3d, 0x7f, 0x9f, 0x4d, 0x51, 0x58,
      ]);
    });

    it('should reject a mask key that is not 4 bytes', () => {
      expect(() =>
        encodeFrame(Opcode.TEXT, Buffer.from('x'), { mask: Buffer.alloc(3) }),
      ).toThrow(RangeError);
    });
  });

  describe('applyMask', () => {
    it('should be its own inverse', () => {
      const payload = Buffer.from('patch delivery');
      expect(applyMask(applyMask(payload, clientMask), clientMask)).toEqual(
        payload,
      );
    });
  });

  describe('FrameDecoder', () => {
    it.each([10, 200, 100000])(
      'should recover a masked %i-byte text payload',
      (size) => {
        const payload = Buffer.alloc(size);
        for (let i = 0; i < size; i++) {
          payload[i] = 0x61 + (i % 26);
        }
        const decoder = new FrameDecoder();

        const frames = decoder.push(
          encodeFrame(Opcode.TEXT, payload, { mask: clientMask }),
        );

        expect(frames).toHaveLength(1);
        expect(frames[0].opcode).toBe(Opcode.TEXT);
        expect(frames[0].fin).toBe(true);
        expect(frames[0].masked).toBe(true);
        expect(frames[0].payload.equals(payload)).toBe(true);
        expect(decoder.hasPartialFrame()).toBe(false);
      },
    );

    it('should decode unmasked frames', () => {
      const frames = new FrameDecoder().push(encodeTextFrame('plain'));

      expect(frames[0].masked).toBe(false);
      expect(frames[0].payload.toString('utf8')).toBe('plain');
    });

    it('should wait for a frame split across chunks', () => {
      const decoder = new FrameDecoder();
      const frame = encodeFrame(Opcode.PING, Buffer.from('abc'), {
        mask: clientMask,
      });

      for (let i = 0; i < frame.length - 1; i++) {
        expect(decoder.push(frame.subarray(i, i + 1))).toEqual([]);
      }
      expect(decoder.hasPartialFrame()).toBe(true);

      const frames = decoder.push(frame.subarray(frame.length - 1));
      expect(frames).toHaveLength(1);
      expect(frames[0].opcode).toBe(Opcode.PING);
      expect(frames[0].payload.toString()).toBe('abc');
      expect(decoder.hasPartialFrame()).toBe(false);
    });

    it('should return every frame contained in one chunk in order', () => {
      const chunk = Buffer.concat([
        encodeFrame(Opcode.PING, Buffer.from('1'), { mask: clientMask }),
        encodeFrame(Opcode.TEXT, Buffer.from('2'), { mask: clientMask }),
        encodeFrame(Opcode.CLOSE, Buffer.alloc(0), { mask: clientMask }),
      ]);

      const frames = new FrameDecoder().push(chunk);

      expect(frames.map((f) => f.opcode)).toEqual([
        Opcode.PING,
        Opcode.TEXT,
        Opcode.CLOSE,
      ]);
    });

    it('should keep the tail of a following frame buffered', () => {
      const decoder = new FrameDecoder();
      const second = encodeTextFrame('second');
      const chunk = Buffer.concat([encodeTextFrame('first'), second.subarray(0, 3)]);

      const frames = decoder.push(chunk);

      expect(frames.map((f) => f.payload.toString())).toEqual(['first']);
      expect(decoder.bufferedBytes()).toBe(3);
    });

    it('should pass through unknown opcodes', () => {
      const frames = new FrameDecoder().push(encodeFrame(0x3, Buffer.from('?')));

      expect(frames[0].opcode).toBe(0x3);
      expect(frames[0].payload.toString()).toBe('?');
    });

    it('should reject a payload over the configured limit', () => {
      const decoder = new FrameDecoder(16);

      expect(() =>
        decoder.push(encodeFrame(Opcode.TEXT, Buffer.alloc(17))),
      ).toThrow(FrameDecodeError);
    });

    it('should reject a 64-bit length beyond the safe integer range', () => {
      const header = Buffer.from([0x81, 127, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);

      expect(() => new FrameDecoder().push(header)).toThrow(
        'is not addressable',
      );
    });

    it('should forget buffered bytes on reset', () => {
      const decoder = new FrameDecoder();
      decoder.push(Buffer.from([0x81]));

      decoder.reset();

      expect(decoder.hasPartialFrame()).toBe(false);
    });
  });
});
