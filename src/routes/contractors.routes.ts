import { RequestHandler, Router } from "express";
import { ContractorsController } from "@/controllers/contractors.controller";

export const create_contractors_router = ({
    contractorsController,
    auth
}: {
    contractorsController: ContractorsController;
    auth: RequestHandler;
}): Router => {
    const router: Router = Router();

    // Contratistas por código postal
    /**
     * @openapi
     * /contractors:
     *   get:
     *     tags: [Contractors]
     *     summary: Perfiles de contratistas por código postal
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: query
     *         name: zip_code
     *         required: true
     *         schema: { type: string }
     *       - in: query
     *         name: city
     *         schema: { type: string }
     *       - in: query
     *         name: fuel_type
     *         schema: { type: string }
     *     responses:
     *       200:
     *         description: Perfiles encontrados (puede ser una lista vacía)
     *       400:
     *         description: Falta zip_code
     */
    router.get("/", auth, contractorsController.get_profiles_by_zip.bind(contractorsController));

    // Agencia por código
    /**
     * @openapi
     * /contractors/agencies/{code}:
     *   get:
     *     tags: [Contractors]
     *     summary: Obtener agencia por código
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: path
     *         name: code
     *         required: true
     *         schema: { type: string }
     *     responses:
     *       200:
     *         description: Agencia
     *       404:
     *         description: Agencia no encontrada
     */
    router.get("/agencies/:code", auth, contractorsController.get_agency_by_code.bind(contractorsController));

    return router;
};
