import { NextFunction, Request, RequestHandler, Response } from "express";
import { User } from "@/contracts/interfaces/user.interface";
import { UsersService } from "@/services/users.service";
import { IDENTITY_ACCESS_HEADER, IDENTITY_ID_HEADER } from "@/utils/constants";
import { ResponseError } from "@/utils/errors";
import { AuthRequest, send_error } from "@/utils/express";
import { IdentityVerifier } from "@/utils/identity";

/**
 * Verifica los dos tokens del proveedor y obtiene el usuario, creándolo en
 * su primer ingreso.
 */
export const authenticate = async (
    verifier: IdentityVerifier,
    usersService: UsersService,
    { access_token, id_token }: { access_token?: string; id_token?: string }
): Promise<User> => {
    if (!access_token || !id_token) throw new ResponseError(401, "No se proporcionó autorización");

    const identity = await verifier.verify({ access_token, id_token });
    return usersService.get_or_create_user({
        email: identity.email,
        full_name: identity.username
    });
};

/**
 * Middleware que deja el usuario autenticado en `req.user`.
 */
export const IdentityAuth = (verifier: IdentityVerifier, usersService: UsersService): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const user = await authenticate(verifier, usersService, {
                access_token: req.header(IDENTITY_ACCESS_HEADER),
                id_token: req.header(IDENTITY_ID_HEADER)
            });

            (req as AuthRequest).user = user;

            next();
        } catch (error) {
            send_error(res, error, "Error al autenticar al usuario");
        }
    };
