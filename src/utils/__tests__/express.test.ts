import { describe, expect, it, vi } from "vitest";
import { ResponseError } from "@/utils/errors";
import { parse_query_boolean, parse_query_number, parse_query_string, send_error } from "@/utils/express";

const create_response = () => {
    const json = vi.fn();
    const status = vi.fn(() => ({ json }));
    return { res: { status }, status, json };
};

describe("send_error", () => {
    it("uses the status and kind of a ResponseError", () => {
        const { res, status, json } = create_response();

        send_error(res, new ResponseError(403, "El contrato no pertenece al usuario indicado"), "fallback");

        expect(status).toHaveBeenCalledWith(403);
        expect(json).toHaveBeenCalledWith({
            ok: false,
            kind: "ownership_mismatch",
            message: "El contrato no pertenece al usuario indicado"
        });
    });

    it("hides unexpected errors behind the fallback message", () => {
        const { res, status, json } = create_response();
        const log = vi.spyOn(console, "error").mockImplementation(() => undefined);

        send_error(res, new Error("socket hang up"), "Error al listar contratos");

        expect(status).toHaveBeenCalledWith(500);
        expect(json).toHaveBeenCalledWith({ ok: false, kind: "upstream_failure", message: "Error al listar contratos" });
        log.mockRestore();
    });
});

describe("query parsers", () => {
    it("parse_query_boolean", () => {
        expect(parse_query_boolean("true")).toBe(true);
        expect(parse_query_boolean("1")).toBe(true);
        expect(parse_query_boolean("false")).toBe(false);
        expect(parse_query_boolean("0")).toBe(false);
        expect(parse_query_boolean("yes")).toBeUndefined();
        expect(parse_query_boolean(undefined)).toBeUndefined();
    });

    it("parse_query_number", () => {
        expect(parse_query_number(undefined, 10)).toBe(10);
        expect(parse_query_number("", 10)).toBe(10);
        expect(parse_query_number("2.5", 10)).toBe(2.5);
        expect(parse_query_number(["1"], 10)).toBeNaN();
    });

    it("parse_query_string", () => {
        expect(parse_query_string("Boston")).toBe("Boston");
        expect(parse_query_string("")).toBeUndefined();
        expect(parse_query_string(["a", "b"])).toBeUndefined();
    });
});
