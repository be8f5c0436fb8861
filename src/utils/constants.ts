import dotenv from "dotenv";
dotenv.config();

export const ALLOWED_ORIGINS = [
    "http://localhost:5173",
    "http://localhost:5174",
];
export const ALLOWED_METHODS = [
    "GET",
    "POST",
    "PUT",
    "PATCH",
    "DELETE",
    "OPTIONS"
];

export const GLOBAL_ENV = {
    MONGODB_URI: process.env.MONGODB_URI ?? "",
    MONGODB_DB_NAME: process.env.MONGODB_DB_NAME || "contracts_db",

    PORT: process.env.PORT ?? "",
    ROUTER_PREFIX: process.env.ROUTER_PREFIX ?? "",

    CLOUD_NAME: process.env.CLOUD_NAME ?? "",
    API_KEY_CLOUDINARY: process.env.API_KEY_CLOUDINARY ?? "",
    API_SECRET_CLOUDINARY: process.env.API_SECRET_CLOUDINARY ?? "",
    CLOUDINARY_FOLDER: process.env.CLOUDINARY_FOLDER || "contracts_files",

    IDENTITY_JWT_KEY: process.env.IDENTITY_JWT_KEY ?? "",
    IDENTITY_ISSUER: process.env.IDENTITY_ISSUER ?? "",
    IDENTITY_AUDIENCE: process.env.IDENTITY_AUDIENCE ?? "",
    IDENTITY_ALGORITHMS: process.env.IDENTITY_ALGORITHMS || "RS256",

    NODE_ENV: process.env.NODE_ENV ?? "",
} as const;

// Paginación por defecto del listado de contratos
export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;

// Cabeceras que envía el front con los tokens del proveedor de identidad
export const IDENTITY_ACCESS_HEADER = "identity-authorization";
export const IDENTITY_ID_HEADER = "identity-id";
