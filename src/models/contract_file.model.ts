import crypto from "crypto";
import { Connection, Model, Schema } from "mongoose";
import { ContractFile } from "@/contracts/interfaces/contract_file.interface";

export const ContractFileSchema = new Schema<ContractFile>(
    {
        _id: { type: String, default: () => crypto.randomUUID() },
        contract_id: { type: String, ref: "Contract", required: true, index: true },
        file_name: { type: String, required: true },
        file_ext: { type: String, default: "" },
        file_url: { type: String, required: true }
    },
    {
        timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
        versionKey: false
    }
);

export const contract_file_model = (connection: Connection): Model<ContractFile> =>
    connection.model<ContractFile>("ContractFile", ContractFileSchema);
