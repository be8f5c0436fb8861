import crypto from "crypto";
import { Connection, Model, Schema } from "mongoose";
import { Contract, FORM_STAGES } from "@/contracts/interfaces/contract.interface";

export const ContractSchema = new Schema<Contract>(
    {
        _id: { type: String, default: () => crypto.randomUUID() },
        user_id: { type: String, ref: "User", required: true },

        zip: { type: String, required: false },
        city: { type: String, required: false },
        fuel_type: { type: String, required: false },
        external_project_id: { type: String, required: false },

        // Fecha y horas sin zona horaria: YYYY-MM-DD y HH:mm:ss
        date: { type: String, required: false },
        start_at_time: { type: String, required: false },
        end_at_time: { type: String, required: false },

        meeting_url: { type: String, required: false },
        inspection_doc: { type: String, required: false },
        invoice_doc: { type: String, required: false },

        form_stage: { type: String, required: true, enum: [...FORM_STAGES], default: "project_id" }
    },
    {
        timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
        versionKey: false
    }
);

ContractSchema.index({ date: 1, start_at_time: 1 });
ContractSchema.index({ user_id: 1 });
ContractSchema.index({ updated_at: -1 });

export const contract_model = (connection: Connection): Model<Contract> =>
    connection.model<Contract>("Contract", ContractSchema);
