import { Server as HttpServer } from "http";
import { DbConnection } from "./config/db.config";
import { build_app } from "./srv_config";
import { MongoContractFileStore } from "./stores/contract_files.store";
import { MongoContractorStore } from "./stores/contractors.store";
import { MongoContractStore } from "./stores/contracts.store";
import { MongoUserStore } from "./stores/users.store";
import { CloudinaryStorage } from "./utils/cloudinary";
import { GLOBAL_ENV } from "./utils/constants";
import { JwtIdentityVerifier, parse_algorithms } from "./utils/identity";

class Server {
    private port: number;
    private dbConnection: DbConnection;
    private httpServer: HttpServer | null = null;

    constructor() {
        this.port = parseInt(GLOBAL_ENV.PORT) || 3000;
        this.dbConnection = new DbConnection(GLOBAL_ENV.MONGODB_URI, GLOBAL_ENV.MONGODB_DB_NAME);
    }

    public async startServer(): Promise<void> {
        try {
            const connection = await this.dbConnection.connect();

            const app = build_app({
                stores: {
                    contracts: new MongoContractStore(connection),
                    contract_files: new MongoContractFileStore(connection),
                    contractors: new MongoContractorStore(connection),
                    users: new MongoUserStore(connection),
                },
                storage: new CloudinaryStorage(
                    {
                        cloud_name: GLOBAL_ENV.CLOUD_NAME,
                        api_key: GLOBAL_ENV.API_KEY_CLOUDINARY,
                        api_secret: GLOBAL_ENV.API_SECRET_CLOUDINARY,
                    },
                    GLOBAL_ENV.CLOUDINARY_FOLDER
                ),
                identity: new JwtIdentityVerifier({
                    key: GLOBAL_ENV.IDENTITY_JWT_KEY,
                    algorithms: parse_algorithms(GLOBAL_ENV.IDENTITY_ALGORITHMS),
                    issuer: GLOBAL_ENV.IDENTITY_ISSUER || undefined,
                    audience: GLOBAL_ENV.IDENTITY_AUDIENCE || undefined,
                }),
            });

            this.httpServer = app.listen(this.port, () => {
                console.log(`🚀 Servidor corriendo en puerto ${this.port}`);
            });
        } catch (error) {
            console.log("❌ Error al iniciar el servidor", error);
            process.exit(1);
        }
    }

    public async shutDown(): Promise<void> {
        try {
            console.log("🔄 Cerrando servidor");
            this.httpServer?.close();
            await this.dbConnection.disconnect();
            process.exit(0);
        } catch (error) {
            console.log("❌ Error al cerrar el servidor", error);
            process.exit(1);
        }
    }
}

const server = new Server();
void server.startServer();

process.on("SIGINT", async () => {
    await server.shutDown();
});

process.on("SIGTERM", async () => {
    await server.shutDown();
});

process.on('uncaughtException', (error) => {
    console.error('❌ Error no capturado:', error);
    void server.shutDown();
});

process.on('unhandledRejection', (reason, promise) => {
    console.error('❌ Promesa rechazada no manejada:', reason);
    console.error('📍 En la promesa:', promise);
    void server.shutDown();
});

export default server;
