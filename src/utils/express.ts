import { Request } from "express";
import { User } from "@/contracts/interfaces/user.interface";
import { ResponseError } from "@/utils/errors";

export interface AuthRequest extends Request {
    user: User;
}

// Lo único que send_error usa de Response
export interface ErrorResponder {
    status(code: number): { json(body: unknown): unknown };
}

/**
 * Respuesta de error uniforme: `{ ok: false, kind, message }`.
 */
export const send_error = (res: ErrorResponder, error: unknown, fallback_message: string): void => {
    if (error instanceof ResponseError) {
        res.status(error.statusCode).json({ ok: false, kind: error.kind, message: error.message });
        return;
    }
    console.error("❌", fallback_message, error);
    res.status(500).json({ ok: false, kind: "upstream_failure", message: fallback_message });
};

/**
 * "true"/"1" → true, "false"/"0" → false, cualquier otro valor → sin filtro.
 */
export const parse_query_boolean = (value: unknown): boolean | undefined => {
    if (value === "true" || value === "1") return true;
    if (value === "false" || value === "0") return false;
    return undefined;
};

/**
 * Número de query string; ausente usa el valor por defecto.
 * Un valor no numérico queda como NaN para que la validación lo rechace.
 */
export const parse_query_number = (value: unknown, default_value: number): number => {
    if (value === undefined || value === "") return default_value;
    return typeof value === "string" ? Number(value) : Number.NaN;
};

export const parse_query_string = (value: unknown): string | undefined =>
    typeof value === "string" && value !== "" ? value : undefined;
