import type { ContractStatus } from '../constants/contract-status';

/** Calendar date as YYYY-MM-DD. */
export type IsoDate = string;

export interface Contract {
  id: number;
  number: string;
  client_id: number;
  principal: number;
  status: ContractStatus;
  start_date: IsoDate;
  end_date: IsoDate;
  /** ISO-8601 timestamp, set by the database on insert. */
  created_at: string;
}

export interface ContractInput {
  number: string;
  client_id: number;
  principal: number;
  /** Defaults to Active on create. */
  status?: ContractStatus;
  start_date: IsoDate;
  end_date: IsoDate;
}

/** Full replacement of the mutable columns. */
export type ContractChanges = Required<ContractInput>;

/** Contract plus the display name of the client it references (null when the client has none on record). */
export type ContractWithClient = Contract & { client_name: string | null };

export interface ContractFilter {
  /** Case-insensitive substring of the contract number. */
  number_contains?: string;
  client_id?: number;
  status?: ContractStatus;
  start_from?: IsoDate;
  start_to?: IsoDate;
  end_from?: IsoDate;
  end_to?: IsoDate;
}

export const CONTRACT_SORT_KEYS = ['id', 'number', 'end_date'] as const;

export type ContractSortKey = (typeof CONTRACT_SORT_KEYS)[number];

export interface ContractSort {
  by: ContractSortKey;
  direction: 'asc' | 'desc';
}

export interface ContractPage {
  items: Contract[];
  total: number;
  page: number;
  page_size: number;
  has_prev: boolean;
  has_next: boolean;
}
