/**
 * =============================================================================
 * USER MODULE - PROJECTIONS
 * =============================================================================
 *
 * Response shapes for users. The password hash never leaves the store.
 * =============================================================================
 */

import { UserRole } from '../../core/constants';
import { UserEntity } from '../../shared/database/repository.interface';

export interface UserView {
  id: string;
  role: UserRole;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  fullName: string;
  isAdmin: boolean;
  isActive: boolean;
  isStaff: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Compact form used in lists and nested inside rides
 */
export interface UserSummary {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  role: UserRole;
}

export function fullName(user: Pick<UserEntity, 'firstName' | 'lastName'>): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function toUserView(user: UserEntity): UserView {
  return {
    id: user.id,
    role: user.role,
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    phoneNumber: user.phoneNumber,
    fullName: fullName(user),
    isAdmin: user.role === UserRole.ADMIN,
    isActive: user.isActive,
    isStaff: user.isStaff,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt
  };
}

export function toUserSummary(user: UserEntity): UserSummary {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: fullName(user),
    role: user.role
  };
}
