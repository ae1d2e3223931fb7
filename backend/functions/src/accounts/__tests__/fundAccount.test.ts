/**
 * Tests for account functions
 * Donation Registry
 */

import { handleFundAccount } from '../fundAccount';
import { handleGetBalance } from '../getBalance';
import { handleSetReceivePolicy } from '../setReceivePolicy';
import { DonationRegistry, donationRegistry } from '../../registry/donationRegistry';
import { MemoryStore } from '../../__tests__/support/memoryStore';
import { CallerRequest } from '../../utils/auth';

jest.mock('../../utils/logger');

const ACCOUNT = '0xabababababababababababababababababababab';

function adminRequest(data: unknown): CallerRequest {
  return { data, auth: { uid: 'admin-uid', token: { admin: true } } };
}

describe('account Functions', () => {
  let registry: DonationRegistry;

  beforeEach(() => {
    jest.clearAllMocks();
    registry = new DonationRegistry(new MemoryStore());
    jest.spyOn(donationRegistry, 'fundAccount')
      .mockImplementation((address, amount) => registry.fundAccount(address, amount));
    jest.spyOn(donationRegistry, 'getAccount')
      .mockImplementation(address => registry.getAccount(address));
    jest.spyOn(donationRegistry, 'setReceivePolicy')
      .mockImplementation((address, acceptsValue) => registry.setReceivePolicy(address, acceptsValue));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fundAccount', () => {
    it('should credit the account for administrators', async () => {
      const result = await handleFundAccount(adminRequest({ address: ACCOUNT, amount: '500' }));

      expect(result).toEqual({ address: ACCOUNT, balance: '500', acceptsValue: true });
    });

    it('should lowercase the address', async () => {
      const result = await handleFundAccount(adminRequest({
        address: '0xABABABABABABABABABABABABABABABABABABABAB',
        amount: 1,
      }));

      expect(result.address).toBe(ACCOUNT);
    });

    it('should refuse callers without the admin claim', async () => {
      await expect(handleFundAccount({
        data: { address: ACCOUNT, amount: '500' },
        auth: { uid: 'user-uid', token: { address: ACCOUNT } },
      })).rejects.toMatchObject({ code: 'permission-denied', details: { errorCode: 'AUTHORIZATION_ERROR' } });
      expect(donationRegistry.fundAccount).not.toHaveBeenCalled();
    });

    it('should refuse unauthenticated callers', async () => {
      await expect(handleFundAccount({ data: { address: ACCOUNT, amount: '500' } }))
        .rejects.toMatchObject({ code: 'unauthenticated' });
    });
  });

  describe('getBalance', () => {
    it('should return a zero balance for unknown addresses', async () => {
      const result = await handleGetBalance({ data: { address: ACCOUNT } });

      expect(result).toEqual({ address: ACCOUNT, balance: '0', acceptsValue: true });
    });
  });

  describe('setReceivePolicy', () => {
    it('should update the policy of the calling address', async () => {
      await handleFundAccount(adminRequest({ address: ACCOUNT, amount: '10' }));

      const result = await handleSetReceivePolicy({
        data: { acceptsValue: false },
        auth: { uid: 'user-uid', token: { address: ACCOUNT } },
      });

      expect(result).toEqual({ address: ACCOUNT, balance: '10', acceptsValue: false });
    });
  });
});
