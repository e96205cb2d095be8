import { describe, it, expect } from '@jest/globals';
import { Message } from '../../../src/message/Message.js';
import {
  cursorToQuery,
  formatCursorLocation,
  locateCursor,
} from '../../../src/query/CursorLocator.js';

// Offsets: MSH 0-9, CR 10, PID 11-23, CR 24
const message = Message.parse('MSH|^~\\&|A\rPID|1|x^y&z~w\r');

describe('CursorLocator', () => {
  describe('locateCursor()', () => {
    it.each([-1, 25, 1.5])('should return null for offset %d', (offset) => {
      expect(locateCursor(message, offset)).toBeNull();
    });

    it('should place the segment name at segment level only', () => {
      const location = locateCursor(message, 0);
      expect(location?.segment).toMatchObject({ name: 'MSH', occurrence: 1, position: 0 });
      expect(location?.segment.range).toEqual({ start: 0, end: 10 });
      expect(location?.field).toBeNull();
      expect(locateCursor(message, 11)?.segment.name).toBe('PID');
      expect(locateCursor(message, 11)?.field).toBeNull();
    });

    it('should treat the header field separator as field 1', () => {
      const location = locateCursor(message, 3);
      expect(location?.field?.index).toBe(1);
      expect(location?.repetition?.index).toBe(1);
      expect(location?.component?.index).toBe(1);
      expect(location?.subcomponent?.index).toBe(1);
      expect(locateCursor(message, 5)?.field?.index).toBe(2);
      expect(locateCursor(message, 5)?.component?.range).toEqual({ start: 4, end: 8 });
    });

    it('should give the separator after a field to that field', () => {
      expect(locateCursor(message, 8)?.field?.index).toBe(2);
      expect(locateCursor(message, 15)?.field?.index).toBe(1);
      expect(locateCursor(message, 16)?.field?.index).toBe(1);
      expect(locateCursor(message, 17)?.field?.index).toBe(2);
    });

    it('should give no field to the segment name and the separator after it', () => {
      expect(locateCursor(message, 13)?.field).toBeNull();
      expect(locateCursor(message, 14)?.field).toBeNull();
    });

    it('should give a terminator to the last field of the segment before it', () => {
      const location = locateCursor(message, 10);
      expect(location?.segment.name).toBe('MSH');
      expect(location?.field?.index).toBe(3);

      const last = locateCursor(message, 24);
      expect(last?.segment).toMatchObject({ name: 'PID', position: 1 });
      expect(last?.field?.index).toBe(2);
      expect(last?.repetition?.index).toBe(2);
    });

    it('should give component and subcomponent separators to the node before them', () => {
      const component = locateCursor(message, 18);
      expect(component?.field?.index).toBe(2);
      expect(component?.repetition?.index).toBe(1);
      expect(component?.component?.index).toBe(1);
      expect(component?.subcomponent?.node.rawValue()).toBe('x');

      const sub = locateCursor(message, 20);
      expect(sub?.component?.index).toBe(2);
      expect(sub?.subcomponent?.index).toBe(1);

      const rep = locateCursor(message, 22);
      expect(rep?.repetition?.index).toBe(1);
      expect(rep?.component?.index).toBe(2);
      expect(rep?.subcomponent?.index).toBe(2);
    });

    it('should locate empty fields', () => {
      const filled = Message.parse('MSH|^~\\&|asdf\rPID|1|0');
      expect(locateCursor(filled, 19)?.field?.index).toBe(1);
      expect(locateCursor(filled, 19)?.field?.node.rawValue()).toBe('1');

      const empty = Message.parse('MSH|^~\\&|asdf\rPID||0');
      const location = locateCursor(empty, 18);
      expect(location?.field?.index).toBe(1);
      expect(location?.field?.node.rawValue()).toBe('');
      expect(location?.subcomponent?.range).toEqual({ start: 18, end: 18 });
    });

    it('should find the deepest node', () => {
      const location = locateCursor(message, 21);
      expect(location?.subcomponent?.index).toBe(2);
      expect(location?.subcomponent?.node.rawValue()).toBe('z');
      expect(location?.subcomponent?.range).toEqual({ start: 21, end: 22 });

      const second = locateCursor(message, 23);
      expect(second?.repetition?.index).toBe(2);
      expect(second?.component?.index).toBe(1);
      expect(second?.subcomponent?.node.rawValue()).toBe('w');
    });

    it('should count occurrences of repeated segments', () => {
      const repeated = Message.parse('MSH|^~\\&\rOBX|1\rOBX|2');
      const location = locateCursor(repeated, 19);
      expect(location?.segment).toMatchObject({ name: 'OBX', occurrence: 2, position: 2 });
      expect(location?.field?.node.rawValue()).toBe('2');
    });

    it('should handle CRLF terminators in lenient messages', () => {
      const lenient = Message.parse('MSH|^~\\&\r\nPID|1', { lenientNewlines: true });
      expect(locateCursor(lenient, 9)?.segment.name).toBe('MSH');
      expect(locateCursor(lenient, 10)?.segment.name).toBe('PID');
      expect(lenient.locateCursor(14)?.field?.index).toBe(1);
    });
  });

  describe('formatCursorLocation()', () => {
    it('should format the full path', () => {
      const location = locateCursor(message, 21);
      expect(location && formatCursorLocation(location)).toBe('PID[1].2[1].2.2');
    });

    it('should stop at the deepest matched level', () => {
      const location = locateCursor(message, 14);
      expect(location && formatCursorLocation(location)).toBe('PID[1]');
      const segment = locateCursor(message, 0);
      expect(segment && formatCursorLocation(segment)).toBe('MSH[1]');
    });
  });

  describe('cursorToQuery()', () => {
    it('should resolve back to the located node', () => {
      const repeated = Message.parse('MSH|^~\\&\rOBX|1\rOBX|2');
      const location = locateCursor(repeated, 19);
      expect(location).not.toBeNull();
      if (location) {
        const located = cursorToQuery(location);
        expect(located).toEqual({
          segment: 'OBX',
          segmentIndex: 2,
          field: 1,
          repetition: 1,
          component: 1,
          subcomponent: 1,
        });
        expect(repeated.query(located)?.node.rawValue()).toBe('2');
      }
    });
  });
});
