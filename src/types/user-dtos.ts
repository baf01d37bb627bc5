import { User } from './domain';

/**
 * Account as returned to its owner and to admins. The password hash never leaves the service.
 */
export interface UserDTO {
  id: number;
  username: string;
  email: string;
  is_active: boolean;
  is_admin: boolean;
}

/** Admin view adds timestamps. */
export interface AdminUserDTO extends UserDTO {
  created_at: string; // ISO 8601
}

export interface RegistrationDTO {
  username: string;
  email: string;
  key: string;
}

export interface TokenDTO {
  access_token: string;
  token_type: 'bearer';
}

/**
 * Mapper class for converting User records to wire DTOs.
 */
export class UserDTOMapper {
  static toDTO(user: User): UserDTO {
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      is_active: user.isActive,
      is_admin: user.isAdmin,
    };
  }

  static toAdminDTO(user: User): AdminUserDTO {
    return {
      ...this.toDTO(user),
      created_at: user.createdAt.toISOString(),
    };
  }
}
