import { z } from 'zod';
import type { Operator } from '../../../shared/schema';
import { logger } from '../logger';
import type { Clock } from '../../utils/dateUtils';
import { isConstraintError } from '../../utils/errorUtils';
import { conflict, notFound } from './errors';
import { findAvailableOperator } from './operatorMatcher';
import {
  accountLockKey,
  stationLockKey,
  type ChargingStore,
  type NewOperator,
  type OperatorUpdate,
  type UserUpdate,
} from './store';

export const createOperatorSchema = z.object({
  userId: z.string().min(1),
  stationId: z.string().min(1),
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().email(),
  phone: z.string().trim().max(30).default(''),
});

export const updateOperatorSchema = z.object({
  stationId: z.string().min(1),
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().email(),
  phone: z.string().trim().max(30),
}).partial();

export type CreateOperatorInput = z.infer<typeof createOperatorSchema>;
export type UpdateOperatorInput = z.infer<typeof updateOperatorSchema>;

/**
 * Station operator profiles. Each profile belongs to exactly one account and
 * keeps the account's contact details in step with its own.
 */
export class OperatorDirectory {
  constructor(private readonly deps: { store: ChargingStore; clock: Clock; timeZone: string }) {}

  async createOperator(input: CreateOperatorInput): Promise<Operator> {
    const { store, clock } = this.deps;
    const user = await store.findUserById(input.userId);
    if (!user) {
      throw notFound('User not found. Register the operator account first.', { userId: input.userId });
    }
    const station = await store.findStationById(input.stationId);
    if (!station) {
      throw notFound('Charging station not found.', { stationId: input.stationId });
    }

    const operator = await store.exclusive([accountLockKey(user.id)], async (tx) => {
      const existing = await tx.findOperatorByUserId(user.id);
      if (existing) {
        throw conflict('Operator profile already exists for this user.', { operatorId: existing.id });
      }

      const now = clock.now();
      const created = await this.insertOperator(tx, {
        userId: user.id,
        stationId: station.id,
        name: input.name,
        email: input.email,
        phone: input.phone,
        isActive: true,
        createdAt: now,
        updatedAt: now,
      });
      await tx.updateUser(user.id, {
        role: 'station_operator',
        name: input.name,
        email: input.email,
        phone: input.phone,
        stationId: station.id,
        updatedAt: now,
      });
      return created;
    });

    logger.info('[Operators] Created operator profile', {
      operatorId: operator.id,
      stationId: station.id,
      userId: user.id,
    });
    return operator;
  }

  /**
   * A station move holds both stations' keys so no reservation can be assigned
   * the operator at its old station meanwhile, and is refused while the operator
   * still holds open bookings.
   */
  async updateOperator(id: string, input: UpdateOperatorInput): Promise<Operator> {
    const { store, clock } = this.deps;
    const operator = await store.findOperatorById(id);
    if (!operator) {
      throw notFound('Operator not found.', { operatorId: id });
    }
    const moving = input.stationId !== undefined && input.stationId !== operator.stationId;
    if (input.stationId && moving) {
      const station = await store.findStationById(input.stationId);
      if (!station) {
        throw notFound('Charging station not found.', { stationId: input.stationId });
      }
    }

    const keys = [stationLockKey(operator.stationId)];
    if (input.stationId && moving) {
      keys.push(stationLockKey(input.stationId));
    }

    const { updated, fields } = await store.exclusive(keys, async (tx) => {
      const now = clock.now();
      if (moving) {
        const upcoming = await tx.countUpcomingBookingsForOperator(id, now);
        if (upcoming > 0) {
          throw conflict(`Cannot move operator to another station. There are ${upcoming} active or future booking(s) assigned.`, {
            operatorId: id,
            upcoming,
          });
        }
      }

      const operatorPatch: OperatorUpdate = { updatedAt: now };
      const userPatch: UserUpdate = {};
      if (input.name !== undefined) {
        operatorPatch.name = input.name;
        userPatch.name = input.name;
      }
      if (input.email !== undefined) {
        operatorPatch.email = input.email;
        userPatch.email = input.email;
      }
      if (input.phone !== undefined) {
        operatorPatch.phone = input.phone;
        userPatch.phone = input.phone;
      }
      if (input.stationId !== undefined) {
        operatorPatch.stationId = input.stationId;
        userPatch.stationId = input.stationId;
      }

      const written = await tx.updateOperator(id, operatorPatch);
      if (!written) {
        throw notFound('Operator not found.', { operatorId: id });
      }
      if (Object.keys(userPatch).length > 0) {
        await tx.updateUser(operator.userId, { ...userPatch, updatedAt: now });
      }
      return { updated: written, fields: Object.keys(userPatch) };
    });

    logger.info('[Operators] Updated operator profile', {
      operatorId: id,
      extra: { fields, moved: moving },
    });
    return updated;
  }

  /**
   * Deactivation is refused while the operator still holds open bookings from now on.
   */
  async deactivateOperator(id: string): Promise<Operator> {
    const { store, clock } = this.deps;
    const operator = await store.findOperatorById(id);
    if (!operator) {
      throw notFound('Operator not found.', { operatorId: id });
    }
    if (!operator.isActive) {
      throw conflict('Operator is already deactivated.', { operatorId: id });
    }

    const now = clock.now();
    const upcoming = await store.countUpcomingBookingsForOperator(id, now);
    if (upcoming > 0) {
      throw conflict(`Cannot deactivate operator. There are ${upcoming} active or future booking(s) assigned.`, {
        operatorId: id,
        upcoming,
      });
    }

    const updated = await store.updateOperator(id, { isActive: false, updatedAt: now });
    if (!updated) {
      throw notFound('Operator not found.', { operatorId: id });
    }
    logger.info('[Operators] Deactivated operator profile', { operatorId: id, stationId: operator.stationId });
    return updated;
  }

  async getOperator(id: string): Promise<Operator> {
    const operator = await this.deps.store.findOperatorById(id);
    if (!operator) {
      throw notFound('Operator not found.', { operatorId: id });
    }
    return operator;
  }

  async listOperatorsByStation(stationId: string): Promise<Operator[]> {
    return this.deps.store.listOperatorsByStation(stationId);
  }

  async findAvailableOperator(stationId: string, instant: Date): Promise<Operator | undefined> {
    return findAvailableOperator(this.deps.store, stationId, instant, this.deps.timeZone);
  }

  private async insertOperator(store: ChargingStore, values: NewOperator): Promise<Operator> {
    try {
      return await store.insertOperator(values);
    } catch (error: unknown) {
      if (isConstraintError(error).type === 'unique') {
        throw conflict('Operator profile already exists for this user.', { userId: values.userId });
      }
      throw error;
    }
  }
}
