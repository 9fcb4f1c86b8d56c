import { ContractorService } from '@stockroom/shared/src/services/contractor-service';
import { TreeCycleError } from '@stockroom/shared/src/utils/errors';
import { createMockClient, MockClient, queryAt, queueRows } from '../helpers/testUtils';

describe('ContractorService (Unit)', () => {
     let contractors: ContractorService;
     let mockClient: MockClient;

     const contractorRow = {
          id: 5,
          name: 'Fastener Supply Co',
          group_id: 1,
          group_name: 'Suppliers',
          description: null,
     };

     beforeEach(() => {
          contractors = new ContractorService();
          mockClient = createMockClient();
     });

     describe('Groups', () => {
          it('should list the group tree', async () => {
               queueRows(mockClient, [
                    { id: 1, name: 'Suppliers', parent_id: null, depth: 0, path: ['Suppliers'] },
                    {
                         id: 3,
                         name: 'Local',
                         parent_id: 1,
                         depth: 1,
                         path: ['Suppliers', 'Local'],
                    },
               ]);

               const groups = await contractors.listGroups(mockClient);

               expect(groups[1]).toEqual({
                    id: 3,
                    name: 'Local',
                    parentId: 1,
                    depth: 1,
                    path: ['Suppliers', 'Local'],
               });
          });

          it('should throw for a missing group', async () => {
               queueRows(mockClient, []);

               await expect(contractors.getGroup(mockClient, 8)).rejects.toThrow(
                    'Contractor group 8 not found'
               );
          });

          it('should not move a group under its own subgroup', async () => {
               queueRows(mockClient, [], [{ id: 3 }], [{ id: 3 }]);

               await expect(
                    contractors.updateGroup(mockClient, 1, { parentId: 3 })
               ).rejects.toThrow(TreeCycleError);
               expect(queryAt(mockClient, 0).text).toBe(
                    'LOCK TABLE contractor_group IN SHARE ROW EXCLUSIVE MODE'
               );
          });

          it('should create a subgroup', async () => {
               queueRows(mockClient, [{ id: 1 }], [{ id: 3, name: 'Local', parent_id: 1 }]);

               const group = await contractors.createGroup(mockClient, { name: 'Local', parentId: 1 });

               expect(group).toEqual({ id: 3, name: 'Local', parentId: 1 });
          });
     });

     describe('Contractors', () => {
          it('should list all contractors without a group filter', async () => {
               queueRows(mockClient, [contractorRow]);

               const list = await contractors.listContractors(mockClient);

               expect(list).toEqual([
                    {
                         id: 5,
                         name: 'Fastener Supply Co',
                         groupId: 1,
                         groupName: 'Suppliers',
                         description: undefined,
                    },
               ]);
               expect(queryAt(mockClient, 0).values).toEqual([null]);
          });

          it('should filter by one group', async () => {
               queueRows(mockClient, []);

               await contractors.listContractors(mockClient, { groupId: 1 });

               expect(mockClient.query).toHaveBeenCalledTimes(1);
               expect(queryAt(mockClient, 0).values).toEqual([[1]]);
          });

          it('should include subgroups when asked', async () => {
               queueRows(mockClient, [{ id: 1 }, { id: 3 }], [contractorRow]);

               await contractors.listContractors(mockClient, { groupId: 1, includeSubgroups: true });

               expect(queryAt(mockClient, 1).values).toEqual([[1, 3]]);
          });

          it('should check the group before creating a contractor', async () => {
               queueRows(mockClient, []);

               await expect(
                    contractors.createContractor(mockClient, { name: 'Acme', groupId: 99 })
               ).rejects.toThrow('Contractor group 99 not found');
          });

          it('should create an ungrouped contractor', async () => {
               queueRows(mockClient, [
                    { id: 6, name: 'Acme', group_id: null, group_name: null, description: 'Walk-in' },
               ]);

               const contractor = await contractors.createContractor(mockClient, {
                    name: 'Acme',
                    description: 'Walk-in',
               });

               expect(contractor).toEqual({
                    id: 6,
                    name: 'Acme',
                    groupId: undefined,
                    groupName: undefined,
                    description: 'Walk-in',
               });
               expect(queryAt(mockClient, 0).values).toEqual(['Acme', null, 'Walk-in']);
          });

          it('should detach a contractor from its group', async () => {
               queueRows(mockClient, [{ ...contractorRow, group_id: null, group_name: null }]);

               await contractors.updateContractor(mockClient, 5, { groupId: null });

               expect(queryAt(mockClient, 0).values).toEqual([5, null, true, null, false, null]);
          });

          it('should throw when deleting a missing contractor', async () => {
               queueRows(mockClient, []);

               await expect(contractors.deleteContractor(mockClient, 5)).rejects.toThrow(
                    'Contractor 5 not found'
               );
          });
     });
});
