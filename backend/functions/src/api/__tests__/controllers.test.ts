/**
 * Tests for the read-only REST controllers
 * Donation Registry
 */

import { ProjectController } from '../projects/projectController';
import { DonationController } from '../donations/donationController';
import { AccountController } from '../accounts/accountController';
import { DonationRegistry } from '../../registry/donationRegistry';
import { MemoryStore } from '../../__tests__/support/memoryStore';
import { Address, ProjectId } from '../../types/global';

jest.mock('../../utils/logger');

const NOW = 1700000000;
const CREATOR: Address = '0x1111111111111111111111111111111111111111';
const DONOR: Address = '0x2222222222222222222222222222222222222222';

function mockResponse() {
  const res = {
    locals: { requestId: 'req-test' },
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('REST controllers', () => {
  let registry: DonationRegistry;
  let projectId: ProjectId;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Date, 'now').mockReturnValue(NOW * 1000);

    registry = new DonationRegistry(new MemoryStore());
    const created = await registry.create(CREATOR, 'Project Name', 'Project Description');
    projectId = created.projectId;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ProjectController', () => {
    it('should return the project record', async () => {
      const controller = new ProjectController(registry);
      const res = mockResponse();

      await controller.getProject({ params: { projectId }, query: {} }, res);

      expect(res.json).toHaveBeenCalledWith({
        id: projectId,
        creator: CREATOR,
        name: 'Project Name',
        createTime: NOW,
      });
    });

    it('should page project events', async () => {
      const controller = new ProjectController(registry);
      await registry.modifyDescription(CREATOR, projectId, 'Second');
      await registry.modifyDescription(CREATOR, projectId, 'Third');

      const first = mockResponse();
      await controller.getProjectEvents({ params: { projectId }, query: { limit: '2' } }, first);
      expect(first.json).toHaveBeenCalledWith(expect.objectContaining({ nextSeq: 2 }));

      const second = mockResponse();
      await controller.getProjectEvents({ params: { projectId }, query: { fromSeq: '2', limit: '2' } }, second);
      expect(second.json).toHaveBeenCalledWith({
        projectId,
        events: [{ type: 'ModifyDescription', seq: 3, projectId, description: 'Third', time: NOW }],
        nextSeq: null,
      });
    });

    it('should serialize donation totals in the history', async () => {
      const controller = new ProjectController(registry);
      await registry.fundAccount(DONOR, 1000n);
      await registry.donate(DONOR, projectId, 'Donator Message', 100n);
      const res = mockResponse();

      await controller.getProjectHistory({ params: { projectId }, query: {} }, res);

      expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
        description: 'Project Description',
        ceased: false,
        totalDonated: '100',
        donationCount: 1,
      }));
    });

    it('should answer 400 for a malformed project id', async () => {
      const controller = new ProjectController(registry);
      const res = mockResponse();

      await controller.getProject({ params: { projectId: 'nope' }, query: {} }, res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
        error: 'ValidationError',
        errorCode: 'VALIDATION_ERROR',
        requestId: 'req-test',
      }));
    });

    it('should answer 500 for unexpected failures', async () => {
      const controller = new ProjectController(registry);
      jest.spyOn(registry, 'getProject').mockRejectedValue(new Error('store offline'));
      const res = mockResponse();

      await controller.getProject({ params: { projectId }, query: {} }, res);

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ errorCode: 'UNKNOWN_ERROR' }));
    });
  });

  describe('DonationController', () => {
    it('should return the cumulative donated amount', async () => {
      await registry.fundAccount(DONOR, 1000n);
      await registry.donate(DONOR, projectId, '', 100n);
      const res = mockResponse();

      await new DonationController(registry).getDonated({ params: { donor: DONOR, projectId }, query: {} }, res);

      expect(res.json).toHaveBeenCalledWith({ donor: DONOR, projectId, amount: '100' });
    });
  });

  describe('AccountController', () => {
    it('should return the account balance as a string', async () => {
      await registry.fundAccount(DONOR, 1000n);
      const res = mockResponse();

      await new AccountController(registry).getAccount({ params: { address: DONOR }, query: {} }, res);

      expect(res.json).toHaveBeenCalledWith({ address: DONOR, balance: '1000', acceptsValue: true });
    });
  });
});
