import { Connection, Model } from "mongoose";
import { NewUser, User, UserStore } from "@/contracts/interfaces/user.interface";
import { user_model } from "@/models/user.model";

export class MongoUserStore implements UserStore {
    private model: Model<User>;

    constructor(connection: Connection) {
        this.model = user_model(connection);
    }

    public async find_by_email(email: string): Promise<User | null> {
        return this.model.findOne({ email }).lean<User>();
    }

    public async create(data: NewUser): Promise<User> {
        const user = await this.model.create(data);
        return user.toObject();
    }
}
