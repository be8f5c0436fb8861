export type ErrorKind =
    | "validation"
    | "unauthorized"
    | "ownership_mismatch"
    | "not_found"
    | "upstream_failure";

const kind_from_status = (statusCode: number): ErrorKind => {
    switch (statusCode) {
        case 400: return "validation";
        case 401: return "unauthorized";
        case 403: return "ownership_mismatch";
        case 404: return "not_found";
        default: return "upstream_failure";
    }
};

export class ResponseError extends Error {
    public readonly statusCode: number;
    public readonly kind: ErrorKind;

    constructor(statusCode: number, message: string) {
        super(message);
        this.name = "ResponseError";
        this.statusCode = statusCode;
        this.kind = kind_from_status(statusCode);
    }
}
