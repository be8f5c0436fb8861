import { Connection, Model } from "mongoose";
import { ContractFile, ContractFileStore, NewContractFile } from "@/contracts/interfaces/contract_file.interface";
import { contract_file_model } from "@/models/contract_file.model";

export class MongoContractFileStore implements ContractFileStore {
    private model: Model<ContractFile>;

    constructor(connection: Connection) {
        this.model = contract_file_model(connection);
    }

    public async create(data: NewContractFile): Promise<ContractFile> {
        const contract_file = await this.model.create(data);
        return contract_file.toObject();
    }

    public async list_by_contract(contract_id: string): Promise<ContractFile[]> {
        return this.model.find({ contract_id }).sort({ created_at: 1 }).lean<ContractFile[]>();
    }

    public async delete_by_id(id: string): Promise<void> {
        await this.model.deleteOne({ _id: id });
    }
}
