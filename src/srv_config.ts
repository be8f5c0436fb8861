import cors, { CorsOptions } from "cors";
import express, { Application, Request, Response } from "express";
import morgan from "morgan";
import rateLimit from "express-rate-limit";

import { GLOBAL_ENV, ALLOWED_ORIGINS, ALLOWED_METHODS } from "@/utils/constants";

import swaggerUi from "swagger-ui-express";
import { swaggerSpec } from "@/swagger";

import { IdentityAuth } from "@/auth/identity.auth";
import { AuthController } from "@/controllers/auth.controller";
import { ContractorsController } from "@/controllers/contractors.controller";
import { ContractsController } from "@/controllers/contracts.controller";
import { ContractStore } from "@/contracts/interfaces/contract.interface";
import { ContractFileStore } from "@/contracts/interfaces/contract_file.interface";
import { ContractorStore } from "@/contracts/interfaces/contractor.interface";
import { BlobStorage } from "@/contracts/interfaces/storage.interface";
import { UserStore } from "@/contracts/interfaces/user.interface";
import { ContractFilesService } from "@/services/contract_files.service";
import { ContractorsService } from "@/services/contractors.service";
import { ContractsService } from "@/services/contracts.service";
import { UsersService } from "@/services/users.service";
import { IdentityVerifier } from "@/utils/identity";

// Importar rutas
import { create_auth_router } from "@/routes/auth.routes";
import { create_contractors_router } from "@/routes/contractors.routes";
import { create_contracts_router } from "@/routes/contracts.routes";

export interface AppDependencies {
    stores: {
        contracts: ContractStore;
        contract_files: ContractFileStore;
        contractors: ContractorStore;
        users: UserStore;
    };
    storage: BlobStorage;
    identity: IdentityVerifier;
}

// Configuración CORS con orígenes permitidos
const corsOptions: CorsOptions = {
    origin: ALLOWED_ORIGINS,
    methods: ALLOWED_METHODS,
    credentials: true,
    optionsSuccessStatus: 204,
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With', 'Identity-Authorization', 'Identity-ID'],
};

const generalLimiter = rateLimit({
    windowMs: 10 * 60 * 1000,    // 10 minutos
    limit: 500,                 // 500 requests por ventana de tiempo por IP
    message: {
        ok: false,
        message: "Límite de 500 peticiones por 10 minutos excedido",
    },
    standardHeaders: true,      // Incluir headers `RateLimit-*` en la respuesta
    legacyHeaders: false,       // Deshabilitar headers `X-RateLimit-*`
});

export const build_app = ({ stores, storage, identity }: AppDependencies): Application => {
    const usersService = new UsersService(stores.users);
    const contractsService = new ContractsService(stores.contracts);
    const contractFilesService = new ContractFilesService(stores.contracts, stores.contract_files, storage);
    const contractorsService = new ContractorsService(stores.contractors);

    const auth = IdentityAuth(identity, usersService);

    const app: Application = express();

    // #======== MIDDLEWARES ========#
    app.use(express.json());
    app.use(cors(corsOptions));
    app.use(express.urlencoded({ extended: true, limit: "10mb" }));
    app.use(generalLimiter);
    if (GLOBAL_ENV.NODE_ENV !== "test") app.use(morgan("dev"));

    // #======== ROUTES ========#
    /**
     * @openapi
     * /health:
     *   get:
     *     tags: [Health]
     *     summary: Health check
     *     description: Verifica que el servidor está arriba y devuelve timestamp.
     *     security: []
     *     responses:
     *       200:
     *         description: OK
     *         content:
     *           application/json:
     *             schema:
     *               $ref: '#/components/schemas/HealthResponse'
     */
    app.get(`${GLOBAL_ENV.ROUTER_PREFIX}/health`, (req: Request, res: Response) => {
        res.status(200).json({
            ok: true,
            message: "Server is running",
            timestamp: new Date().toISOString(),
        });
    });

    // Documentación Swagger
    app.get(`${GLOBAL_ENV.ROUTER_PREFIX}/docs.json`, (req: Request, res: Response) => {
        res.status(200).json(swaggerSpec);
    });
    app.use(`${GLOBAL_ENV.ROUTER_PREFIX}/docs`, swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: "CONTRACTS API - Documentación"
    }));

    // Rutas de la API
    app.use(`${GLOBAL_ENV.ROUTER_PREFIX}/auth`, create_auth_router({
        authController: new AuthController(),
        auth
    }));
    app.use(`${GLOBAL_ENV.ROUTER_PREFIX}/contractors`, create_contractors_router({
        contractorsController: new ContractorsController(contractorsService),
        auth
    }));
    app.use(`${GLOBAL_ENV.ROUTER_PREFIX}/contracts`, create_contracts_router({
        contractsController: new ContractsController(contractsService, contractFilesService),
        auth
    }));

    // Manejo de rutas no encontradas (debe ir al final)
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            ok: false,
            kind: "not_found",
            message: "Route not found"
        });
    });

    return app;
};
