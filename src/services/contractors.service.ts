import { Agency, ContractorStore, ZipProfile, ZipProfileFilters } from "@/contracts/interfaces/contractor.interface";
import { ResponseError } from "@/utils/errors";

export class ContractorsService {
    constructor(private readonly contractors: ContractorStore) {}

    public async get_profiles_by_zip({ zip_code, city, fuel_type }: Partial<ZipProfileFilters>): Promise<ZipProfile[]> {
        try {
            if (!zip_code) throw new ResponseError(400, "zip_code es requerido");
            return await this.contractors.find_profiles({ zip_code, city, fuel_type });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudieron obtener los contratistas");
        }
    }

    public async get_agency_by_code({ code }: { code: string }): Promise<Agency> {
        try {
            const agency = await this.contractors.find_agency_by_code(code);
            if (!agency) throw new ResponseError(404, `Agencia ${code} no encontrada`);
            return agency;
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo obtener la agencia");
        }
    }
}
