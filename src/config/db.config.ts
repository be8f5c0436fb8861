import { ResponseError } from "@/utils/errors";
import mongoose, { Connection } from "mongoose";

/**
 * Conexión a MongoDB construida explícitamente al arrancar y pasada a los
 * stores; no hay conexión global por defecto.
 */
export class DbConnection {
    private connection: Connection | null = null;

    constructor(
        private readonly uri: string,
        private readonly db_name: string
    ) {}

    public async connect(): Promise<Connection> {
        if (this.connection) return this.connection;

        if (!this.uri) {
            throw new ResponseError(500, "MONGODB_URI is not defined");
        }

        try {
            const connection = await mongoose
                .createConnection(this.uri, { dbName: this.db_name })
                .asPromise();

            if (connection.readyState === 1) {
                console.log("✅ Connected to MongoDB");
            }

            this.connection = connection;
            return connection;
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, `No se pudo conectar a MongoDB: ${String(error)}`);
        }
    }

    public async disconnect(): Promise<void> {
        if (!this.connection) return;
        await this.connection.close();
        this.connection = null;
    }
}
