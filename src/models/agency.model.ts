import crypto from "crypto";
import { Connection, Model, Schema } from "mongoose";
import { Agency } from "@/contracts/interfaces/contractor.interface";

export const AgencySchema = new Schema<Agency>(
    {
        _id: { type: String, default: () => crypto.randomUUID() },
        code: { type: String, required: true, unique: true },
        name: { type: String, default: "" },
        phone: { type: String, default: "" },
        website: { type: String, default: "" },
        to_apply_url: { type: String, default: "" },
        notes: { type: String, default: "" }
    },
    {
        timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
        versionKey: false
    }
);

export const agency_model = (connection: Connection): Model<Agency> =>
    connection.model<Agency>("Agency", AgencySchema);
