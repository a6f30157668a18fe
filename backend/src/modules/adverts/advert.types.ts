/**
 * backend/src/modules/adverts/advert.types.ts
 *
 * WHY:
 * - Domain types for the Adverts module.
 *
 * RULES:
 * - ownerId is a weak reference to a user id: the DB does not enforce it.
 * - createdAt is assigned by the DB and never changes.
 */

import type { UserId } from '../users';

export type AdvertId = number;

export type Advert = {
  id: AdvertId;
  name: string;
  description: string;
  createdAt: Date;
  ownerId: UserId;
};

export type NewAdvert = {
  name: string;
  description: string;
  ownerId: UserId;
};
