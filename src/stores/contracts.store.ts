import { Connection, Model, UpdateQuery } from "mongoose";
import {
    Contract,
    ContractChanges,
    ContractFilters,
    ContractPage,
    ContractStore,
    NewContract
} from "@/contracts/interfaces/contract.interface";
import { contract_model } from "@/models/contract.model";
import { build_contract_match, build_contract_page_pipeline } from "@/utils/contract-query";

export class MongoContractStore implements ContractStore {
    private model: Model<Contract>;

    constructor(connection: Connection) {
        this.model = contract_model(connection);
    }

    public async create(data: NewContract): Promise<Contract> {
        const contract = await this.model.create(data);
        return contract.toObject();
    }

    public async find_by_id(id: string): Promise<Contract | null> {
        return this.model.findById(id).lean<Contract>();
    }

    public async update(id: string, { set, unset }: ContractChanges): Promise<Contract | null> {
        const update: UpdateQuery<Contract> = { $set: set };
        if (unset.length > 0) {
            const unset_fields: Record<string, ""> = {};
            for (const field of unset) unset_fields[field] = "";
            update.$unset = unset_fields;
        }

        return this.model
            .findOneAndUpdate({ _id: id }, update, { new: true, runValidators: true })
            .lean<Contract>();
    }

    public async list_all(): Promise<Contract[]> {
        return this.model.find().sort({ updated_at: -1 }).lean<Contract[]>();
    }

    public async list_page({
        filters,
        skip,
        limit
    }: {
        filters: ContractFilters;
        skip: number;
        limit: number;
    }): Promise<ContractPage> {
        const match = build_contract_match(filters);

        // Dos lecturas independientes: el total y la página
        const [items, total_count] = await Promise.all([
            this.model.aggregate<Contract>(build_contract_page_pipeline({ match, skip, limit })),
            this.model.countDocuments(match)
        ]);

        return { items, total_count };
    }
}
