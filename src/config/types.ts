/** One entry of the endpoints file as written by the operator. */
export interface RawEndpointRecord {
  name: string;
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export type RawEndpointsFile = RawEndpointRecord[];
