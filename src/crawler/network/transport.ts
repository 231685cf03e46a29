import type { FetchRequest } from '../../types.js';

export interface TransportResponse {
  content: string;
  finalUrl: string;
  status?: number;
}

export interface Transport {
  fetch(request: FetchRequest): Promise<TransportResponse>;
  shutdown?(): Promise<void>;
}
