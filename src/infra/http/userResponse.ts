import type { PersistedUser } from '../../domain/users/user.js';

export interface UserResponse {
  id: string;
  name: string;
  email: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  deletedAt?: string;
}

export function toUserResponse(user: PersistedUser): UserResponse {
  const response: UserResponse = {
    id: user.id,
    name: user.name,
    email: user.email,
    version: user.version,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
  if (user.deletedAt !== null) {
    response.deletedAt = user.deletedAt.toISOString();
  }
  return response;
}
