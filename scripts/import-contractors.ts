import * as XLSX from "xlsx";
import { DbConnection } from "../src/config/db.config";
import { parse_agency_rows, parse_zip_profile_rows, read_first_sheet } from "../src/parsers/contractors.parser";
import { MongoContractorStore } from "../src/stores/contractors.store";
import { GLOBAL_ENV } from "../src/utils/constants";

// Uso: npm run import:contractors -- [zip_contractors.xlsx] [agencies.xlsx]
const contractorsPath = process.argv[2] || "./zip_contractors.xlsx";
const agenciesPath = process.argv[3] || "./agencies.xlsx";

const run = async (): Promise<void> => {
    console.log("📄 Leyendo archivos Excel...");
    const profiles = parse_zip_profile_rows(read_first_sheet(XLSX.readFile(contractorsPath)));
    const agencies = parse_agency_rows(read_first_sheet(XLSX.readFile(agenciesPath)));

    const db = new DbConnection(GLOBAL_ENV.MONGODB_URI, GLOBAL_ENV.MONGODB_DB_NAME);
    const connection = await db.connect();

    try {
        console.log("🔄 Reemplazando agencias y perfiles por código postal...");
        const result = await new MongoContractorStore(connection).replace_catalogue({ agencies, profiles });
        console.log(`✅ ${result.agencies} agencias y ${result.profiles} perfiles cargados`);
    } finally {
        await db.disconnect();
    }
};

run().catch((error) => {
    console.error("❌ Error al importar contratistas:", error);
    process.exit(1);
});
