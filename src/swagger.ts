import swaggerJSDoc from "swagger-jsdoc";
import { GLOBAL_ENV } from "@/utils/constants";

const isProd = process.env.NODE_ENV === "production";

const nullableString = { type: "string", nullable: true };

/**
 * Nota sobre auth:
 * - Cada petición lleva dos tokens del proveedor de identidad:
 *   `Identity-Authorization` (access token) e `Identity-ID` (id token).
 * - Swagger UI solo permite un header por esquema; el id token se documenta aparte.
 */
export const swaggerSpec = swaggerJSDoc({
    definition: {
        openapi: "3.0.3",
        info: {
            title: "CONTRACTS API",
            version: "1.0.0",
            description: [
                "Documentación OpenAPI/Swagger del backend de contratistas y contratos.",
                "",
                "Autenticación:",
                "- Header `Identity-Authorization`: access token.",
                "- Header `Identity-ID`: id token (trae email y usuario).",
                "",
                "Flujo del contrato: project_id → schedule → documents → closed.",
            ].join("\n"),
        },
        servers: [
            {
                url: GLOBAL_ENV.ROUTER_PREFIX || "/",
            },
        ],
        tags: [
            { name: "Health", description: "Endpoints de verificación" },
            { name: "Auth", description: "Sesión del usuario" },
            { name: "Contractors", description: "Contratistas por código postal y agencias" },
            { name: "Contracts", description: "Contratos y su flujo por etapas" },
            { name: "Contract Files", description: "Documentos subidos a un contrato" },
        ],
        components: {
            securitySchemes: {
                identityTokens: {
                    type: "apiKey",
                    in: "header",
                    name: "Identity-Authorization",
                    description: "Access token del proveedor de identidad. También se requiere el header Identity-ID.",
                },
            },
            schemas: {
                ErrorResponse: {
                    type: "object",
                    properties: {
                        ok: { type: "boolean", example: false },
                        kind: {
                            type: "string",
                            enum: ["validation", "unauthorized", "ownership_mismatch", "not_found", "upstream_failure"],
                        },
                        message: { type: "string", example: "Contrato no encontrado" },
                    },
                    required: ["ok", "kind", "message"],
                },
                HealthResponse: {
                    type: "object",
                    properties: {
                        ok: { type: "boolean", example: true },
                        message: { type: "string", example: "Server is running" },
                        timestamp: { type: "string", format: "date-time" },
                    },
                },
                ContractRequest: {
                    type: "object",
                    properties: {
                        contract_id: { type: "string", description: "Si viene, se actualiza ese contrato" },
                        user_id: { type: "string", description: "Dueño del contrato; por defecto el usuario de la sesión" },
                        zip: nullableString,
                        city: nullableString,
                        fuel_type: nullableString,
                        external_project_id: nullableString,
                        date: { type: "string", nullable: true, example: "2026-01-21" },
                        start_at_time: { type: "string", nullable: true, example: "14:30" },
                        end_at_time: { type: "string", nullable: true, example: "15:30" },
                        meeting_url: nullableString,
                        inspection_doc: nullableString,
                        invoice_doc: nullableString,
                        form_stage: { type: "string", enum: ["project_id", "schedule", "documents", "closed"] },
                        clear_fields: { type: "array", items: { type: "string" }, example: ["date", "start_at_time"] },
                    },
                },
                Contract: {
                    type: "object",
                    properties: {
                        id: { type: "string" },
                        user_id: { type: "string" },
                        zip: nullableString,
                        city: nullableString,
                        fuel_type: nullableString,
                        external_project_id: nullableString,
                        date: { type: "string", nullable: true, example: "2026-01-21" },
                        start_at_time: { type: "string", nullable: true, example: "14:30:00" },
                        end_at_time: { type: "string", nullable: true, example: "15:30:00" },
                        formatted_datetime: { type: "string", nullable: true, example: "January 21, 2026 at 2:30 PM" },
                        meeting_url: nullableString,
                        inspection_doc: nullableString,
                        invoice_doc: nullableString,
                        form_stage: { type: "string", enum: ["project_id", "schedule", "documents", "closed"] },
                        created_at: { type: "string", format: "date-time" },
                        updated_at: { type: "string", format: "date-time" },
                    },
                },
                ContractListItem: {
                    type: "object",
                    properties: {
                        id: { type: "string" },
                        zip: nullableString,
                        city: nullableString,
                        fuel_type: nullableString,
                        external_project_id: nullableString,
                        formatted_datetime: nullableString,
                        meeting_url: nullableString,
                        form_stage: { type: "string" },
                    },
                },
                ContractFile: {
                    type: "object",
                    properties: {
                        id: { type: "string" },
                        contract_id: { type: "string" },
                        file_name: { type: "string", example: "inspection.pdf" },
                        file_ext: { type: "string", example: "pdf" },
                        file_url: { type: "string" },
                        created_at: { type: "string", format: "date-time" },
                        updated_at: { type: "string", format: "date-time" },
                    },
                },
                Pagination: {
                    type: "object",
                    properties: {
                        current_page: { type: "integer", example: 1 },
                        total_pages: { type: "integer", example: 5 },
                        limit: { type: "integer", example: 10 },
                        has_next_page: { type: "boolean", example: true },
                        has_prev_page: { type: "boolean", example: false },
                    },
                    required: ["current_page", "total_pages", "limit", "has_next_page", "has_prev_page"],
                },
            },
        },
    },
    apis: isProd
        ? ["dist/src/routes/*.js", "dist/src/srv_config.js"]
        : ["src/routes/*.ts", "src/srv_config.ts"],
});
