import { Request, Response } from "express";
import { ContractorsService } from "@/services/contractors.service";
import { parse_query_string, send_error } from "@/utils/express";
import { to_agency_response, to_zip_profile_response } from "@/utils/responses";

export class ContractorsController {
    constructor(private readonly contractorsService: ContractorsService) {}

    public async get_profiles_by_zip(req: Request, res: Response) {
        try {
            const { zip_code, city, fuel_type } = req.query;

            const profiles = await this.contractorsService.get_profiles_by_zip({
                zip_code: parse_query_string(zip_code),
                city: parse_query_string(city),
                fuel_type: parse_query_string(fuel_type)
            });

            res.status(200).json({
                message: "Contratistas obtenidos correctamente",
                data: profiles.map(to_zip_profile_response)
            });
        } catch (error) {
            send_error(res, error, "Error al obtener los contratistas");
        }
    }

    public async get_agency_by_code(req: Request, res: Response) {
        try {
            const { code } = req.params;
            const agency = await this.contractorsService.get_agency_by_code({ code });
            res.status(200).json({ message: "Agencia obtenida correctamente", data: to_agency_response(agency) });
        } catch (error) {
            send_error(res, error, "Error al obtener la agencia");
        }
    }
}
