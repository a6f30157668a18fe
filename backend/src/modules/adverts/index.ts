/**
 * backend/src/modules/adverts/index.ts
 *
 * Public surface of the adverts module.
 */

export { getAdvertById } from './queries/advert.queries';
export { authorizeAdvertOwner } from './policies/advert-ownership.policy';
export type { Advert, AdvertId } from './advert.types';
