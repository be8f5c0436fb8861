import crypto from "crypto";
import { Connection, Model, Schema } from "mongoose";
import { ZipProfile } from "@/contracts/interfaces/contractor.interface";

export const ZipProfileSchema = new Schema<ZipProfile>(
    {
        _id: { type: String, default: () => crypto.randomUUID() },
        zip_code: { type: String, required: true },
        city: { type: String, default: "" },
        fuel_type: { type: String, default: "" },
        sponsored: { type: String, default: "" },
        utility_type: { type: String, default: "" },
        has_utility: { type: Boolean, default: false },

        proceed_reason: { type: String, default: "" },
        is_dec: { type: Boolean, default: false },
        electrification_candidate: { type: Boolean, default: false },

        // Referencia a Agency.code
        agency_code: { type: String, required: false, default: null }
    },
    {
        timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
        versionKey: false
    }
);

ZipProfileSchema.index({ zip_code: 1, city: 1, fuel_type: 1 });

export const zip_profile_model = (connection: Connection): Model<ZipProfile> =>
    connection.model<ZipProfile>("ZipProfile", ZipProfileSchema);
