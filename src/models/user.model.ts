import crypto from "crypto";
import { Connection, Model, Schema } from "mongoose";
import { User } from "@/contracts/interfaces/user.interface";

export const UserSchema = new Schema<User>(
    {
        _id: { type: String, default: () => crypto.randomUUID() },
        email: { type: String, required: true, unique: true },
        full_name: { type: String, required: true, unique: true }
    },
    {
        timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
        versionKey: false
    }
);

export const user_model = (connection: Connection): Model<User> =>
    connection.model<User>("User", UserSchema);
