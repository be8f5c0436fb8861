import { RequestHandler, Router } from "express";
import { ContractsController } from "@/controllers/contracts.controller";
import { upload_single } from "@/middlewares/multer.middleware";

export const create_contracts_router = ({
    contractsController,
    auth
}: {
    contractsController: ContractsController;
    auth: RequestHandler;
}): Router => {
    const router: Router = Router();

    // #========== RUTAS PROTEGIDAS (identidad verificada) ==========#

    // Crear o actualizar contrato
    /**
     * @openapi
     * /contracts:
     *   post:
     *     tags: [Contracts]
     *     summary: Crear o actualizar contrato
     *     description: Sin contract_id crea el contrato; con contract_id actualiza solo los campos enviados. Los valores null o vacíos no modifican nada, para borrar un campo se usa clear_fields. user_id por defecto es el usuario de la sesión.
     *     security:
     *       - identityTokens: []
     *     requestBody:
     *       required: true
     *       content:
     *         application/json:
     *           schema:
     *             $ref: '#/components/schemas/ContractRequest'
     *     responses:
     *       201:
     *         description: Contrato creado
     *       200:
     *         description: Contrato actualizado
     *       400:
     *         description: Datos inválidos
     *         content:
     *           application/json:
     *             schema:
     *               $ref: '#/components/schemas/ErrorResponse'
     *       403:
     *         description: El contrato pertenece a otro usuario
     *       404:
     *         description: Contrato no encontrado
     */
    router.post("/", auth, contractsController.submit_contract.bind(contractsController));

    // Listar todos los contratos (representación completa)
    /**
     * @openapi
     * /contracts:
     *   get:
     *     tags: [Contracts]
     *     summary: Listar todos los contratos (más recientes primero)
     *     security:
     *       - identityTokens: []
     *     responses:
     *       200:
     *         description: Lista de contratos
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 message: { type: string }
     *                 data: { type: array, items: { $ref: '#/components/schemas/Contract' } }
     */
    router.get("/", auth, contractsController.get_all_contracts.bind(contractsController));

    // Listado resumido
    /**
     * @openapi
     * /contracts/list:
     *   get:
     *     tags: [Contracts]
     *     summary: Listado resumido de contratos (más recientes primero)
     *     security:
     *       - identityTokens: []
     *     responses:
     *       200:
     *         description: Lista de contratos
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 message: { type: string }
     *                 data: { type: array, items: { $ref: '#/components/schemas/ContractListItem' } }
     */
    router.get("/list", auth, contractsController.get_contracts_summary.bind(contractsController));

    // Listado paginado por fecha
    /**
     * @openapi
     * /contracts/page:
     *   get:
     *     tags: [Contracts]
     *     summary: Listado paginado de contratos
     *     description: Sin fecha primero, luego por fecha y hora de inicio ascendentes (sin hora al final de su fecha).
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: query
     *         name: page
     *         schema: { type: integer, minimum: 1, default: 1 }
     *       - in: query
     *         name: limit
     *         schema: { type: integer, minimum: 1, default: 10 }
     *       - in: query
     *         name: date_from
     *         schema: { type: string }
     *         description: Fecha mínima (inclusive). Si no se puede interpretar se ignora.
     *       - in: query
     *         name: no_dates
     *         schema: { type: boolean }
     *         description: true solo contratos sin fecha, false solo con fecha
     *     responses:
     *       200:
     *         description: Página de contratos
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 message: { type: string }
     *                 data:
     *                   type: object
     *                   properties:
     *                     items: { type: array, items: { $ref: '#/components/schemas/Contract' } }
     *                     total_count: { type: integer }
     *                     pagination: { $ref: '#/components/schemas/Pagination' }
     *       400:
     *         description: page o limit inválidos
     */
    router.get("/page", auth, contractsController.get_contracts_page.bind(contractsController));

    // Obtener contrato por id
    /**
     * @openapi
     * /contracts/{id}:
     *   get:
     *     tags: [Contracts]
     *     summary: Obtener contrato por ID
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: path
     *         name: id
     *         required: true
     *         schema: { type: string }
     *     responses:
     *       200:
     *         description: Contrato
     *       404:
     *         description: Contrato no encontrado
     */
    router.get("/:id", auth, contractsController.get_contract_by_id.bind(contractsController));

    // Actualizar contrato
    /**
     * @openapi
     * /contracts/{id}:
     *   patch:
     *     tags: [Contracts]
     *     summary: Actualizar campos de un contrato
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: path
     *         name: id
     *         required: true
     *         schema: { type: string }
     *     requestBody:
     *       required: true
     *       content:
     *         application/json:
     *           schema:
     *             $ref: '#/components/schemas/ContractRequest'
     *     responses:
     *       200:
     *         description: Contrato actualizado
     *       403:
     *         description: El contrato pertenece a otro usuario
     *       404:
     *         description: Contrato no encontrado
     */
    router.patch("/:id", auth, contractsController.update_contract.bind(contractsController));

    // Subir archivo del contrato
    /**
     * @openapi
     * /contracts/{contract_id}/files:
     *   post:
     *     tags: [Contract Files]
     *     summary: Subir archivo del contrato
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: path
     *         name: contract_id
     *         required: true
     *         schema: { type: string }
     *     requestBody:
     *       required: true
     *       content:
     *         multipart/form-data:
     *           schema:
     *             type: object
     *             properties:
     *               file: { type: string, format: binary }
     *               doc_type: { type: string, enum: [inspection_doc, invoice_doc] }
     *             required: [file]
     *     responses:
     *       201:
     *         description: Archivo registrado
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 message: { type: string }
     *                 data: { $ref: '#/components/schemas/ContractFile' }
     *       400:
     *         description: Archivo vacío o sin nombre
     *       404:
     *         description: Contrato no encontrado
     */
    router.post("/:contract_id/files", auth, upload_single("file"), contractsController.upload_contract_file.bind(contractsController));

    // Listar archivos del contrato
    /**
     * @openapi
     * /contracts/{contract_id}/files:
     *   get:
     *     tags: [Contract Files]
     *     summary: Listar archivos del contrato
     *     security:
     *       - identityTokens: []
     *     parameters:
     *       - in: path
     *         name: contract_id
     *         required: true
     *         schema: { type: string }
     *     responses:
     *       200:
     *         description: Archivos del contrato
     *       404:
     *         description: Contrato no encontrado
     */
    router.get("/:contract_id/files", auth, contractsController.get_contract_files.bind(contractsController));

    return router;
};
