import { Request, Response } from "express";
import { ContractsService } from "@/services/contracts.service";
import { ContractFilesService, parse_doc_type } from "@/services/contract_files.service";
import { build_pagination, parse_contract_page_query } from "@/utils/contract-query";
import { ResponseError } from "@/utils/errors";
import { AuthRequest, send_error } from "@/utils/express";
import {
    to_contract_file_response,
    to_contract_list_item,
    to_contract_response
} from "@/utils/responses";

// Dueño asumido: el user_id del cuerpo o, si no viene, el usuario de la sesión
const resolve_owner_id = (req: Request, user_id: unknown): string => {
    if (typeof user_id === "string" && user_id) return user_id;
    const caller_id = (req as AuthRequest).user?._id;
    if (!caller_id) throw new ResponseError(401, "No se proporcionó autorización");
    return caller_id;
};

const parse_contract_id = (value: unknown): string | undefined => {
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value !== "string") throw new ResponseError(400, "contract_id debe ser un texto");
    return value;
};

export class ContractsController {
    constructor(
        private readonly contractsService: ContractsService,
        private readonly contractFilesService: ContractFilesService
    ) {}

    public async submit_contract(req: Request, res: Response) {
        try {
            const { contract_id, user_id, ...payload } = req.body ?? {};
            const target_id = parse_contract_id(contract_id);

            const contract = await this.contractsService.submit_contract({
                user_id: resolve_owner_id(req, user_id),
                contract_id: target_id,
                payload
            });

            res.status(target_id ? 200 : 201).json({
                message: target_id ? "Contrato actualizado correctamente" : "Contrato creado exitosamente",
                data: to_contract_response(contract)
            });
        } catch (error) {
            send_error(res, error, "Error al guardar el contrato");
        }
    }

    public async update_contract(req: Request, res: Response) {
        try {
            const { id } = req.params;
            const { user_id, ...payload } = req.body ?? {};

            const contract = await this.contractsService.update_contract({
                id,
                owner_id: resolve_owner_id(req, user_id),
                payload
            });

            res.status(200).json({ message: "Contrato actualizado correctamente", data: to_contract_response(contract) });
        } catch (error) {
            send_error(res, error, "Error al actualizar el contrato");
        }
    }

    public async get_contract_by_id(req: Request, res: Response) {
        try {
            const { id } = req.params;
            const contract = await this.contractsService.get_contract_by_id({ id });
            res.status(200).json({ message: "Contrato obtenido correctamente", data: to_contract_response(contract) });
        } catch (error) {
            send_error(res, error, "Error al obtener el contrato");
        }
    }

    public async get_all_contracts(req: Request, res: Response) {
        try {
            const contracts = await this.contractsService.get_all_contracts();
            res.status(200).json({
                message: "Contratos obtenidos correctamente",
                data: contracts.map(to_contract_response)
            });
        } catch (error) {
            send_error(res, error, "Error al listar contratos");
        }
    }

    public async get_contracts_summary(req: Request, res: Response) {
        try {
            const contracts = await this.contractsService.get_all_contracts();
            res.status(200).json({
                message: "Contratos obtenidos correctamente",
                data: contracts.map(to_contract_list_item)
            });
        } catch (error) {
            send_error(res, error, "Error al listar contratos");
        }
    }

    public async get_contracts_page(req: Request, res: Response) {
        try {
            const query = parse_contract_page_query(req.query);
            const { items, total_count } = await this.contractsService.list_contracts_page(query);

            res.status(200).json({
                message: "Contratos obtenidos correctamente",
                data: {
                    items: items.map(to_contract_response),
                    total_count,
                    pagination: build_pagination({ page: query.page, limit: query.limit, total_count })
                }
            });
        } catch (error) {
            send_error(res, error, "Error al listar contratos");
        }
    }

    //* #========== FILES ==========#
    public async upload_contract_file(req: Request, res: Response) {
        try {
            const { contract_id } = req.params;

            const contract_file = await this.contractFilesService.upload_contract_file({
                contract_id,
                file: req.file,
                doc_type: parse_doc_type(req.body?.doc_type)
            });

            res.status(201).json({ message: "Archivo subido correctamente", data: to_contract_file_response(contract_file) });
        } catch (error) {
            send_error(res, error, "Error al subir el archivo");
        }
    }

    public async get_contract_files(req: Request, res: Response) {
        try {
            const { contract_id } = req.params;
            const files = await this.contractFilesService.get_contract_files({ contract_id });
            res.status(200).json({
                message: "Archivos obtenidos correctamente",
                data: files.map(to_contract_file_response)
            });
        } catch (error) {
            send_error(res, error, "Error al listar los archivos");
        }
    }
}
