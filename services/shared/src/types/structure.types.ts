// Warehouse and contractor hierarchies

export type WarehouseKind = 'PHYSICAL' | 'VIRTUAL';

export interface Warehouse {
     id: number;
     name: string;
     parentId?: number;
     kind: WarehouseKind;
}

export interface CreateWarehouseRequest {
     name: string;
     parentId?: number | null;
     kind?: WarehouseKind;
}

export type UpdateWarehouseRequest = Partial<CreateWarehouseRequest>;

export interface ContractorGroup {
     id: number;
     name: string;
     parentId?: number;
}

export interface CreateContractorGroupRequest {
     name: string;
     parentId?: number | null;
}

export type UpdateContractorGroupRequest = Partial<CreateContractorGroupRequest>;

// A node as it appears in a depth-first tree listing
export type TreeEntry<T> = T & {
     depth: number;
     path: string[];
};

export interface Contractor {
     id: number;
     name: string;
     groupId?: number;
     groupName?: string;
     description?: string;
}

export interface CreateContractorRequest {
     name: string;
     groupId?: number | null;
     description?: string | null;
}

export type UpdateContractorRequest = Partial<CreateContractorRequest>;

export interface ContractorFilter {
     groupId?: number;
     includeSubgroups?: boolean;
}
