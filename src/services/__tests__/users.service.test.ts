import { describe, expect, it } from "vitest";
import { NewUser, User } from "@/contracts/interfaces/user.interface";
import { UsersService } from "@/services/users.service";
import { MemoryUserStore } from "../../__tests__/helpers/memory-stores";

/** Simula otra petición que crea el usuario justo antes que esta */
class RacingUserStore extends MemoryUserStore {
    private raced = false;

    public async create(data: NewUser): Promise<User> {
        if (!this.raced) {
            this.raced = true;
            await super.create(data);
            throw Object.assign(new Error("E11000 duplicate key error"), { code: 11000 });
        }
        return super.create(data);
    }
}

describe("UsersService", () => {
    it("creates the user on first sign-in", async () => {
        const store = new MemoryUserStore();
        const service = new UsersService(store);

        const user = await service.get_or_create_user({ email: "ana@example.com", full_name: "ana" });

        expect(user).toMatchObject({ _id: "user-1", email: "ana@example.com", full_name: "ana" });
        expect(store.records).toHaveLength(1);
    });

    it("returns the existing user by email", async () => {
        const store = new MemoryUserStore();
        const service = new UsersService(store);
        await service.get_or_create_user({ email: "ana@example.com", full_name: "ana" });

        const again = await service.get_or_create_user({ email: "ana@example.com", full_name: "ana" });

        expect(again._id).toBe("user-1");
        expect(store.records).toHaveLength(1);
    });

    it("reads the winner when a concurrent request created it first", async () => {
        const store = new RacingUserStore();
        const service = new UsersService(store);

        const user = await service.get_or_create_user({ email: "ana@example.com", full_name: "ana" });

        expect(user._id).toBe("user-1");
        expect(store.records).toHaveLength(1);
    });

    it("wraps unexpected store errors", async () => {
        const store = new MemoryUserStore();
        store.find_by_email = async () => {
            throw new Error("connection reset");
        };
        const service = new UsersService(store);

        await expect(service.get_or_create_user({ email: "ana@example.com", full_name: "ana" })).rejects.toMatchObject({
            statusCode: 500,
            kind: "upstream_failure",
            message: "No se pudo obtener el usuario"
        });
    });
});
