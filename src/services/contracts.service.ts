import {
    Contract,
    ContractPageQuery,
    ContractPayload,
    ContractStore
} from "@/contracts/interfaces/contract.interface";
import { build_contract_changes, build_new_contract, is_empty_change } from "@/utils/contract-patch";
import { resolve_contract_filters, validate_pagination } from "@/utils/contract-query";
import { ResponseError } from "@/utils/errors";

export class ContractsService {
    constructor(private readonly contracts: ContractStore) {}

    //* #========== POST METHODS ==========#
    public async create_contract({
        user_id,
        payload
    }: {
        user_id: string;
        payload: ContractPayload;
    }): Promise<Contract> {
        try {
            const data = build_new_contract(user_id, payload);
            return await this.contracts.create(data);
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo crear el contrato");
        }
    }

    /**
     * Crea el contrato si no llega `contract_id`; si llega, lo actualiza
     * siempre que pertenezca a `user_id`. La propiedad se valida antes de
     * escribir.
     */
    public async submit_contract({
        user_id,
        contract_id,
        payload
    }: {
        user_id: string;
        contract_id?: string;
        payload: ContractPayload;
    }): Promise<Contract> {
        if (!contract_id) return this.create_contract({ user_id, payload });
        return this.update_contract({ id: contract_id, owner_id: user_id, payload });
    }

    //* #========== GET METHODS ==========#
    public async get_contract_by_id({ id }: { id: string }): Promise<Contract> {
        try {
            const contract = await this.contracts.find_by_id(id);
            if (!contract) throw new ResponseError(404, `Contrato ${id} no encontrado`);
            return contract;
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo obtener el contrato");
        }
    }

    public async get_all_contracts(): Promise<Contract[]> {
        try {
            return await this.contracts.list_all();
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudieron listar los contratos");
        }
    }

    public async list_contracts_page({
        page,
        limit,
        date_from,
        no_dates
    }: ContractPageQuery): Promise<{ items: Contract[]; total_count: number }> {
        try {
            validate_pagination({ page, limit });

            const filters = resolve_contract_filters({ date_from, no_dates });
            const skip = (page - 1) * limit;

            return await this.contracts.list_page({ filters, skip, limit });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudieron listar los contratos");
        }
    }

    //* #========== PUT METHODS ==========#
    public async update_contract({
        id,
        owner_id,
        payload
    }: {
        id: string;
        owner_id?: string;
        payload: ContractPayload;
    }): Promise<Contract> {
        try {
            const changes = build_contract_changes(payload);

            const contract = await this.contracts.find_by_id(id);
            if (!contract) throw new ResponseError(404, `Contrato ${id} no encontrado`);
            if (owner_id && contract.user_id !== owner_id) {
                throw new ResponseError(403, "El contrato no pertenece al usuario indicado");
            }

            if (is_empty_change(changes)) return contract;

            const updated = await this.contracts.update(id, changes);
            if (!updated) throw new ResponseError(404, `Contrato ${id} no encontrado`);
            return updated;
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo actualizar el contrato");
        }
    }
}
