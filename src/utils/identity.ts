import jwt, { Algorithm, JwtPayload, VerifyOptions } from "jsonwebtoken";
import { ResponseError } from "@/utils/errors";

export interface VerifiedIdentity {
    email: string;
    username: string;
}

export interface IdentityVerifier {
    verify(tokens: { access_token: string; id_token: string }): Promise<VerifiedIdentity>;
}

const JWT_ALGORITHMS: Algorithm[] = [
    "HS256", "HS384", "HS512",
    "RS256", "RS384", "RS512",
    "ES256", "ES384", "ES512",
    "PS256", "PS384", "PS512",
];

const is_algorithm = (value: string): value is Algorithm =>
    JWT_ALGORITHMS.some((algorithm) => algorithm === value);

export const parse_algorithms = (value: string): Algorithm[] => {
    const algorithms = value.split(",").map((item) => item.trim()).filter(is_algorithm);
    if (algorithms.length === 0) throw new ResponseError(500, `Algoritmos de firma no soportados: ${value}`);
    return algorithms;
};

/**
 * Verifica los dos tokens del proveedor de identidad (access + id token)
 * con la llave configurada. El id token es el que trae email y usuario.
 */
export class JwtIdentityVerifier implements IdentityVerifier {
    constructor(
        private readonly options: {
            key: string;
            algorithms: Algorithm[];
            issuer?: string;
            audience?: string;
        }
    ) {}

    public async verify({ access_token, id_token }: { access_token: string; id_token: string }): Promise<VerifiedIdentity> {
        if (!this.options.key) throw new ResponseError(500, "IDENTITY_JWT_KEY is not defined");

        const base: VerifyOptions = { algorithms: this.options.algorithms };
        if (this.options.issuer) base.issuer = this.options.issuer;

        try {
            // El access token no trae `aud`, solo se valida firma, emisor y expiración
            jwt.verify(access_token, this.options.key, base);

            const id_options: VerifyOptions = { ...base };
            if (this.options.audience) id_options.audience = this.options.audience;
            const claims = jwt.verify(id_token, this.options.key, id_options);

            return this.read_identity(claims);
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            if (error instanceof jwt.JsonWebTokenError) {
                throw new ResponseError(401, `No se pudieron validar las credenciales: ${error.message}`);
            }
            throw new ResponseError(500, "Error al validar las credenciales");
        }
    }

    private read_identity(claims: string | JwtPayload): VerifiedIdentity {
        if (typeof claims === "string") throw new ResponseError(401, "Token de identidad inválido");

        const email = claims.email;
        const username = claims["cognito:username"] ?? claims.username;

        if (typeof email !== "string" || !email) throw new ResponseError(401, "El token de identidad no trae email");
        if (typeof username !== "string" || !username) throw new ResponseError(401, "El token de identidad no trae usuario");

        return { email, username };
    }
}
