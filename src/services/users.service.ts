import { User, UserStore } from "@/contracts/interfaces/user.interface";
import { ResponseError } from "@/utils/errors";

const is_duplicate_key = (error: unknown): boolean =>
    typeof error === "object" && error !== null && "code" in error && error.code === 11000;

export class UsersService {
    constructor(private readonly users: UserStore) {}

    /**
     * Usuario por email; si no existe se crea con el nombre que trae el
     * proveedor de identidad.
     */
    public async get_or_create_user({ email, full_name }: { email: string; full_name: string }): Promise<User> {
        try {
            const user = await this.users.find_by_email(email);
            if (user) return user;

            try {
                return await this.users.create({ email, full_name });
            } catch (error) {
                // Dos peticiones simultáneas del mismo usuario: gana la primera
                if (!is_duplicate_key(error)) throw error;
                const existing = await this.users.find_by_email(email);
                if (!existing) throw new ResponseError(400, "El nombre de usuario ya está registrado con otro email");
                return existing;
            }
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo obtener el usuario");
        }
    }
}
