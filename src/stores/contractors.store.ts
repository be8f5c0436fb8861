import { Connection, FilterQuery, Model } from "mongoose";
import {
    Agency,
    ContractorStore,
    NewAgency,
    NewZipProfile,
    ZipProfile,
    ZipProfileFilters
} from "@/contracts/interfaces/contractor.interface";
import { agency_model } from "@/models/agency.model";
import { zip_profile_model } from "@/models/zip_profile.model";

export class MongoContractorStore implements ContractorStore {
    private agencies: Model<Agency>;
    private profiles: Model<ZipProfile>;

    constructor(connection: Connection) {
        this.agencies = agency_model(connection);
        this.profiles = zip_profile_model(connection);
    }

    public async find_profiles({ zip_code, city, fuel_type }: ZipProfileFilters): Promise<ZipProfile[]> {
        const query: FilterQuery<ZipProfile> = { zip_code };
        if (city) query.city = city;
        if (fuel_type) query.fuel_type = fuel_type;

        return this.profiles.find(query).lean<ZipProfile[]>();
    }

    public async find_agency_by_code(code: string): Promise<Agency | null> {
        return this.agencies.findOne({ code }).lean<Agency>();
    }

    public async replace_catalogue({
        agencies,
        profiles
    }: {
        agencies: NewAgency[];
        profiles: NewZipProfile[];
    }): Promise<{ agencies: number; profiles: number }> {
        // Perfiles primero: referencian agencias por código
        await this.profiles.deleteMany({});
        await this.agencies.deleteMany({});

        await this.agencies.insertMany(agencies);
        await this.profiles.insertMany(profiles);

        return { agencies: agencies.length, profiles: profiles.length };
    }
}
