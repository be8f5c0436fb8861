import { Request, Response } from "express";
import { AuthRequest, send_error } from "@/utils/express";
import { to_user_response } from "@/utils/responses";

export class AuthController {
    /**
     * Devuelve el usuario que resolvió IdentityAuth (creado en su primer ingreso).
     */
    public async get_session_user(req: Request, res: Response) {
        try {
            const { user } = req as AuthRequest;
            res.status(200).json({ message: "Usuario autenticado", data: to_user_response(user) });
        } catch (error) {
            send_error(res, error, "Error al obtener el usuario");
        }
    }
}
