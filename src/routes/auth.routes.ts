import { RequestHandler, Router } from "express";
import { AuthController } from "@/controllers/auth.controller";

export const create_auth_router = ({
    authController,
    auth
}: {
    authController: AuthController;
    auth: RequestHandler;
}): Router => {
    const router: Router = Router();

    /**
     * @openapi
     * /auth/user:
     *   post:
     *     tags: [Auth]
     *     summary: Resolver el usuario de la sesión
     *     description: Verifica los tokens del proveedor de identidad y crea el usuario en su primer ingreso.
     *     security:
     *       - identityTokens: []
     *     responses:
     *       200:
     *         description: Usuario autenticado
     *       401:
     *         description: Credenciales inválidas
     */
    router.post("/user", auth, authController.get_session_user.bind(authController));

    return router;
};
