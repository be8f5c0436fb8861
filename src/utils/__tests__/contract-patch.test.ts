import { describe, expect, it } from "vitest";
import { build_contract_changes, build_new_contract, is_empty_change } from "@/utils/contract-patch";
import { ResponseError } from "@/utils/errors";

describe("build_new_contract", () => {
    it("defaults form_stage to project_id and parses dates and times", () => {
        expect(build_new_contract("user-1", {
            zip: "02134",
            date: "2026-01-21T10:00:00",
            start_at_time: "09:00",
            end_at_time: "2026-01-21T10:30:00"
        })).toEqual({
            user_id: "user-1",
            form_stage: "project_id",
            zip: "02134",
            date: "2026-01-21",
            start_at_time: "09:00:00",
            end_at_time: "10:30:00"
        });
    });

    it("skips null fields", () => {
        expect(build_new_contract("user-1", { city: null, form_stage: null })).toEqual({
            user_id: "user-1",
            form_stage: "project_id"
        });
    });

    it("treats empty form fields as absent", () => {
        expect(build_new_contract("user-1", { zip: "02134", date: "", start_at_time: "", form_stage: "" })).toEqual({
            user_id: "user-1",
            form_stage: "project_id",
            zip: "02134"
        });
    });

    it("requires the owner", () => {
        expect(() => build_new_contract("", {})).toThrow("user_id es requerido");
    });

    it("rejects an unparseable date", () => {
        expect(() => build_new_contract("user-1", { date: "someday" })).toThrow(ResponseError);
    });

    it("rejects an unknown stage", () => {
        expect(() => build_new_contract("user-1", { form_stage: "archived" })).toThrow(
            "form_stage debe ser uno de: project_id, schedule, documents, closed"
        );
    });

    it("rejects non-text values", () => {
        expect(() => build_new_contract("user-1", { zip: 2134 })).toThrow("zip debe ser un texto");
    });
});

describe("build_contract_changes", () => {
    it("sets only the fields that are present", () => {
        expect(build_contract_changes({ form_stage: "schedule", city: undefined, zip: null })).toEqual({
            set: { form_stage: "schedule" },
            unset: []
        });
    });

    it("leaves fields sent as empty text untouched", () => {
        expect(build_contract_changes({ city: "", end_at_time: "", meeting_url: "https://meet.test/abc" })).toEqual({
            set: { meeting_url: "https://meet.test/abc" },
            unset: []
        });
    });

    it("clears the fields named in clear_fields", () => {
        expect(build_contract_changes({ clear_fields: ["date", "start_at_time", "date"] })).toEqual({
            set: {},
            unset: ["date", "start_at_time"]
        });
    });

    it("rejects clearing an unknown field", () => {
        expect(() => build_contract_changes({ clear_fields: ["user_id"] })).toThrow(
            "clear_fields contiene un campo no permitido: user_id"
        );
    });

    it("rejects setting and clearing the same field", () => {
        expect(() => build_contract_changes({ date: "2026-01-21", clear_fields: ["date"] })).toThrow(
            "date no se puede asignar y limpiar a la vez"
        );
    });

    it("rejects clear_fields that is not a list", () => {
        expect(() => build_contract_changes({ clear_fields: "date" })).toThrow("clear_fields debe ser una lista");
    });

    it("detects an empty change", () => {
        expect(is_empty_change(build_contract_changes({}))).toBe(true);
        expect(is_empty_change(build_contract_changes({ city: "Boston" }))).toBe(false);
    });
});
