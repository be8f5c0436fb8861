export interface User {
    _id: string;
    email: string;
    full_name: string;
    created_at: Date;
    updated_at: Date;
}

export type NewUser = Pick<User, "email" | "full_name">;

export interface UserStore {
    find_by_email(email: string): Promise<User | null>;
    create(data: NewUser): Promise<User>;
}

export interface UserResponse {
    id: string;
    email: string;
    full_name: string;
    created_at: string;
    updated_at: string;
}
