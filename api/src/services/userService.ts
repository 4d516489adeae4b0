import { fail, ok, type ServiceResult } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { UserRepository } from '../repositories/types.js';
import type { User } from '../types.js';

export interface CreateUserInput {
    username: string;
    email?: string | null;
}

export class UserService {
    constructor(
        private readonly users: UserRepository,
        private readonly logger: Logger = createLogger('users'),
    ) {}

    async createUser(input: CreateUserInput): Promise<ServiceResult<User>> {
        if (await this.users.findByUsername(input.username)) {
            return fail('CONFLICT', 'Username already exists');
        }
        if (input.email && (await this.users.findByEmail(input.email))) {
            return fail('CONFLICT', 'Email already exists');
        }

        const user = await this.users.create({ username: input.username, email: input.email ?? null });
        this.logger.info(`Created user ${user.id} (${user.username})`);
        return ok(user);
    }

    listUsers(): Promise<User[]> {
        return this.users.list();
    }

    async getUser(userId: string): Promise<ServiceResult<User>> {
        const user = await this.users.findById(userId);
        return user ? ok(user) : fail('NOT_FOUND', 'User not found');
    }
}
