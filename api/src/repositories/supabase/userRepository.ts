import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import type { User } from '../../types.js';
import type { NewUser, UserRepository } from '../types.js';
import { databaseError, NO_ROWS_CODE, UserRow, USERS_TABLE } from './rows.js';

export class SupabaseUserRepository implements UserRepository {
    constructor(private readonly client: SupabaseClient) {}

    async create(input: NewUser): Promise<User> {
        const { data, error } = await this.client
            .from(USERS_TABLE)
            .insert({ id: uuidv4(), username: input.username, email: input.email })
            .select()
            .single();

        if (error) throw databaseError('create user', error);
        return UserRow.parse(data);
    }

    findById(id: string): Promise<User | null> {
        return this.findOne('id', id);
    }

    findByUsername(username: string): Promise<User | null> {
        return this.findOne('username', username);
    }

    findByEmail(email: string): Promise<User | null> {
        return this.findOne('email', email);
    }

    async list(): Promise<User[]> {
        const { data, error } = await this.client
            .from(USERS_TABLE)
            .select('*')
            .order('created_at', { ascending: false });

        if (error) throw databaseError('list users', error);
        return UserRow.array().parse(data ?? []);
    }

    private async findOne(column: 'id' | 'username' | 'email', value: string): Promise<User | null> {
        const { data, error } = await this.client
            .from(USERS_TABLE)
            .select('*')
            .eq(column, value)
            .single();

        if (error) {
            if (error.code === NO_ROWS_CODE) return null;
            throw databaseError(`look up user by ${column}`, error);
        }
        return UserRow.parse(data);
    }
}
