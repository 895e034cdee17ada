import { z } from 'zod';
import type { JsonObject } from '../types/json.js';
import type { EndpointDefinitions } from './types.js';

/** Largest page the API serves, larger requests are capped. */
export const MAX_PAGE_SIZE = 100;

const nonBlank = z.string().refine((value) => value.trim().length > 0, 'must not be blank');
const erc = z.enum(['erc721', 'erc1155']);
const pageIndex = z.number().int().nonnegative().default(0);
const pageSize = z
  .number()
  .int()
  .nonnegative()
  .default(20)
  .transform((size) => Math.min(size, MAX_PAGE_SIZE));

/**
 * Endpoint table: for every API method, the schema of its camelCase parameters
 * and the fields sent with every request to it.
 */
export const endpoints = {
  getAllNftByUserAddress: {
    params: z.object({ erc, userAddress: nonBlank, pageIndex, pageSize }),
    fixed: { walletType: 3 },
  },
  getGroupByNftContract: {
    params: z.object({ erc, userAddress: nonBlank }),
  },
  getMintByUserAddress: {
    params: z.object({ userAddress: nonBlank, pageIndex, pageSize }),
  },
  getMintByUserAddressAndNftAddress: {
    params: z.object({ nftAddress: nonBlank, userAddress: nonBlank, pageIndex, pageSize }),
  },
  getNFTRecordByContract: {
    params: z.object({ nftAddress: nonBlank, pageIndex, pageSize }),
  },
  getNftByContractAndUserAddress: {
    params: z.object({ nftAddress: nonBlank, userAddress: nonBlank, pageIndex, pageSize }),
  },
  getRecordByUserAddressAndTokenId: {
    params: z.object({ nftAddress: nonBlank, tokenId: nonBlank, userAddress: nonBlank, pageIndex, pageSize }),
  },
  getSingleNft: {
    params: z.object({ nftAddress: nonBlank, tokenId: nonBlank }),
  },
  getSingleNftRecord: {
    params: z.object({ nftAddress: nonBlank, tokenId: nonBlank, pageIndex, pageSize }),
  },
  getStates: {
    params: z.object({ nftAddress: z.array(nonBlank).min(1, 'must not be empty') }),
  },
  getUserRecordByContract: {
    params: z.object({ nftAddress: nonBlank, userAddress: nonBlank, pageIndex, pageSize }),
  },
  getUserRecordByUserAddress: {
    params: z.object({ userAddress: nonBlank, pageIndex, pageSize }),
  },
} satisfies EndpointDefinitions;

/**
 * Builds the request body: parameter keys become snake_case, fixed fields are
 * merged in as they are.
 *
 * @example
 * toWireBody({ userAddress: '0xabc', pageIndex: 0 }, { walletType: 3 });
 * // { user_address: '0xabc', page_index: 0, walletType: 3 }
 */
export function toWireBody(params: JsonObject, fixed: JsonObject = {}): JsonObject {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(params)) {
    body[key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)] = value;
  }

  return { ...body, ...fixed };
}
