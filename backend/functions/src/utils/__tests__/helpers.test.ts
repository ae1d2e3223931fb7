/**
 * Tests for General Helper Functions
 * Donation Registry
 */

import { helpers } from '../helpers';
import { ValidationError } from '../errors';
import { ZERO_ADDRESS } from '../constants';

describe('helpers', () => {
  describe('identity', () => {
    it('derives the project id from creator, name and creation time', () => {
      const id = helpers.identity.deriveProjectId(
        '0x1111111111111111111111111111111111111111',
        'Project Name',
        1700000000
      );

      expect(id).toBe('0x1a8ca51e1af01efc23694892a98aab858a7a5c96513ad2110175b7ecf9412e58');
    });

    it('changes the project id when the creation time changes', () => {
      const id = helpers.identity.deriveProjectId(
        '0x1111111111111111111111111111111111111111',
        'Project Name',
        1700000001
      );

      expect(id).toBe('0xa844db69d2e41d0ee63d80b7dc7bc275e9856f4c0b8f7ed9275aa36a4f9efdf3');
    });

    it('validates address and project id formats', () => {
      expect(helpers.identity.isAddress('0x1111111111111111111111111111111111111111')).toBe(true);
      expect(helpers.identity.isAddress('0x1234')).toBe(false);
      expect(helpers.identity.isProjectId('0x1a8ca51e1af01efc23694892a98aab858a7a5c96513ad2110175b7ecf9412e58')).toBe(true);
      expect(helpers.identity.isProjectId('not-an-id')).toBe(false);
    });

    it('recognizes the zero address', () => {
      expect(helpers.identity.isZeroAddress(ZERO_ADDRESS)).toBe(true);
      expect(helpers.identity.isZeroAddress('0x1111111111111111111111111111111111111111')).toBe(false);
    });
  });

  describe('amount', () => {
    it('parses decimal strings beyond the safe integer range', () => {
      expect(helpers.amount.parse('123456789012345678901234567890'))
        .toBe(123456789012345678901234567890n);
    });

    it('parses integers and negative strings', () => {
      expect(helpers.amount.parse(100)).toBe(100n);
      expect(helpers.amount.parse('-5')).toBe(-5n);
    });

    it('rejects fractional and unsafe numbers', () => {
      expect(() => helpers.amount.parse(1.5)).toThrow(ValidationError);
      expect(() => helpers.amount.parse(2 ** 60)).toThrow(ValidationError);
      expect(() => helpers.amount.parse('12.5')).toThrow(ValidationError);
    });
  });

  describe('string', () => {
    it('measures UTF-8 byte length', () => {
      expect(helpers.string.byteLength('abc')).toBe(3);
      expect(helpers.string.byteLength('é')).toBe(2);
      expect(helpers.string.byteLength('')).toBe(0);
    });
  });

  describe('date', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('returns the current time in whole seconds', () => {
      jest.spyOn(Date, 'now').mockReturnValue(1700000000999);
      expect(helpers.date.nowSeconds()).toBe(1700000000);
    });
  });

  describe('async', () => {
    it('resolves with the promise value when it settles in time', async () => {
      await expect(
        helpers.async.withTimeout(Promise.resolve('done'), 50, () => new Error('late'))
      ).resolves.toBe('done');
    });

    it('rejects with the timeout error when the promise is too slow', async () => {
      const slow = new Promise<string>(resolve => setTimeout(() => resolve('done'), 50));

      await expect(
        helpers.async.withTimeout(slow, 5, () => new Error('late'))
      ).rejects.toThrow('late');
      await slow;
    });
  });
});
