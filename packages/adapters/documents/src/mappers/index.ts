export { pingRequest, getRequest, existsRequest, getParams } from './request.js';
export { parseGetResponse } from './get-response.js';
export type { GetResponse } from './get-response.js';
