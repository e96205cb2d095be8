import { describe, it, expect } from '@jest/globals';
import { Message } from '../../../src/message/Message.js';

const SOURCE = [
  'MSH|^~\\&|SND|FAC|||20240101120000||ORU^R01|MSG00001|P|2.5',
  'PID|1||123^^^HOSP~456^^^OTHER||Smith^Jane^Q||19800101|F',
  'OBX|1|ST|GLU||5.5',
  'OBX|2|TX|NOTE||a\\T\\b&c',
].join('\r');

describe('Message', () => {
  const message = Message.parse(SOURCE);

  describe('segment accessors', () => {
    it('should find the first segment by name', () => {
      expect(message.segment('OBX')?.field(1)?.rawValue()).toBe('1');
      expect(message.segment('ZZZ')).toBeNull();
    });

    it('should iterate same-named segments in order, more than once', () => {
      const obx = message.segmentsNamed('OBX');
      expect(Array.from(obx).map((s) => s.field(1)?.rawValue())).toEqual(['1', '2']);
      expect(Array.from(obx)).toHaveLength(2);
    });

    it('should select the nth occurrence', () => {
      expect(message.segmentN('OBX', 2)?.field(3)?.rawValue()).toBe('NOTE');
      expect(message.segmentN('OBX', 3)).toBeNull();
      expect(message.segmentN('OBX', 0)).toBeNull();
      expect(message.segmentCount('OBX')).toBe(2);
      expect(message.segmentCount('NTE')).toBe(0);
    });

    it('should keep the source text', () => {
      expect(message.rawValue()).toBe(SOURCE);
      expect(message.segments.map((s) => s.name)).toEqual(['MSH', 'PID', 'OBX', 'OBX']);
    });
  });

  describe('node accessors', () => {
    const pid = message.segment('PID');

    it('should return null for out-of-range indexes', () => {
      expect(pid?.field(0)).toBeNull();
      expect(pid?.field(-1)).toBeNull();
      expect(pid?.field(99)).toBeNull();
      expect(pid?.field(1.5)).toBeNull();
      expect(pid?.field(5)?.component(9)).toBeNull();
    });

    it('should expose repetitions and components', () => {
      const ids = pid?.field(3);
      expect(ids?.hasRepetitions()).toBe(true);
      expect(ids?.repetition(2)?.rawValue()).toBe('456^^^OTHER');
      expect(ids?.repetition(2)?.component(4)?.rawValue()).toBe('OTHER');
      expect(ids?.component(1)?.rawValue()).toBe('123');

      const name = pid?.field(5);
      expect(name?.hasRepetitions()).toBe(false);
      expect(name?.repetition(1)?.hasComponents()).toBe(true);
      expect(name?.component(2)?.rawValue()).toBe('Jane');
    });

    it('should split subcomponents and decode on demand', () => {
      const note = message.segmentN('OBX', 2)?.field(5)?.component(1);
      expect(note?.hasSubcomponents()).toBe(true);
      expect(note?.subcomponent(1)?.rawValue()).toBe('a\\T\\b');
      expect(note?.subcomponent(1)?.decodedValue(message.separators)).toBe('a&b');
      expect(note?.subcomponent(2)?.rawValue()).toBe('c');
    });

    it('should report empty nodes', () => {
      expect(pid?.field(2)?.isEmpty()).toBe(true);
      expect(pid?.field(2)?.rawValue()).toBe('');
      expect(pid?.field(1)?.isEmpty()).toBe(false);
    });

    it('should slice the source by range', () => {
      const field = pid?.field(7);
      expect(field?.range).toEqual({ start: 103, end: 111 });
      expect(SOURCE.substring(103, 111)).toBe('19800101');
    });
  });

  describe('queryValue()', () => {
    it('should return decoded text or null', () => {
      expect(message.queryValue('OBX[2].5.1.1')).toBe('a&b');
      expect(message.queryValue('PID.5.2')).toBe('Jane');
      expect(message.queryValue('PID.5.7')).toBeNull();
    });
  });

  describe('toJSON()', () => {
    it('should produce plain data', () => {
      const json = Message.parse('MSH|^~\\&|A\rZZZ').toJSON();
      expect(json.separators).toEqual({
        field: '|',
        component: '^',
        repetition: '~',
        escape: '\\',
        subcomponent: '&',
      });
      expect(json.lenientNewlines).toBe(false);
      expect(json.segments.map((s) => s.name)).toEqual(['MSH', 'ZZZ']);
      expect(json.segments[0]?.fields.map((f) => f.value)).toEqual(['|', '^~\\&', 'A']);
      expect(json.segments[1]?.fields).toEqual([]);
      expect(JSON.parse(JSON.stringify(json))).toEqual(json);
    });
  });
});
