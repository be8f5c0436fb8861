import { PipelineStage } from "mongoose";
import { ContractFilters, ContractPageQuery, PaginationInfo } from "@/contracts/interfaces/contract.interface";
import { DEFAULT_LIMIT, DEFAULT_PAGE } from "@/utils/constants";
import { parse_date_input } from "@/utils/dates";
import { ResponseError } from "@/utils/errors";
import { parse_query_boolean, parse_query_number, parse_query_string } from "@/utils/express";

export type ContractDateCondition = { $ne?: null; $gte?: string };
export type ContractMatch = { date?: null | ContractDateCondition };

/**
 * Lee los parámetros del listado desde el query string. No valida: eso lo
 * hace el servicio.
 */
export const parse_contract_page_query = (query: Record<string, unknown>): ContractPageQuery => ({
    page: parse_query_number(query.page, DEFAULT_PAGE),
    limit: parse_query_number(query.limit, DEFAULT_LIMIT),
    date_from: parse_query_string(query.date_from),
    no_dates: parse_query_boolean(query.no_dates)
});

/**
 * Valida page/limit del listado. Valores no enteros o menores a 1 se
 * rechazan en lugar de ajustarse.
 */
export const validate_pagination = ({ page, limit }: { page: number; limit: number }): void => {
    if (!Number.isInteger(page) || page < 1) {
        throw new ResponseError(400, "page debe ser un entero mayor o igual a 1");
    }
    if (!Number.isInteger(limit) || limit < 1) {
        throw new ResponseError(400, "limit debe ser un entero mayor o igual a 1");
    }
};

/**
 * Resuelve los filtros del listado:
 * - no_dates=true ignora date_from
 * - un date_from que no se puede interpretar se descarta sin error
 */
export const resolve_contract_filters = ({ date_from, no_dates }: ContractFilters): ContractFilters => {
    if (no_dates === true) return { no_dates: true };

    const filters: ContractFilters = {};
    if (no_dates === false) filters.no_dates = false;

    const parsed_from = date_from ? parse_date_input(date_from) : null;
    if (parsed_from) filters.date_from = parsed_from;

    return filters;
};

/**
 * Construye el $match sobre `date`. Espera filtros ya resueltos.
 * `date: null` cubre tanto null como campo ausente.
 */
export const build_contract_match = ({ date_from, no_dates }: ContractFilters): ContractMatch => {
    if (no_dates === true) return { date: null };

    const condition: ContractDateCondition = {};
    if (no_dates === false) condition.$ne = null;
    if (date_from) condition.$gte = date_from;

    return Object.keys(condition).length > 0 ? { date: condition } : {};
};

/**
 * Página de contratos ordenada así:
 * 1. sin fecha primero (null ordena antes que cualquier string)
 * 2. fecha ascendente
 * 3. hora de inicio ascendente, las que no tienen hora al final de su fecha
 * 4. _id para que el orden sea total
 */
export const build_contract_page_pipeline = ({
    match,
    skip,
    limit
}: {
    match: ContractMatch;
    skip: number;
    limit: number;
}): PipelineStage[] => [
    { $match: match },
    {
        $addFields: {
            _missing_start: { $cond: { if: { $gt: ["$start_at_time", null] }, then: 0, else: 1 } }
        }
    },
    { $sort: { date: 1, _missing_start: 1, start_at_time: 1, _id: 1 } },
    { $skip: skip },
    { $limit: limit },
    { $project: { _missing_start: 0 } }
];

export const build_pagination = ({
    page,
    limit,
    total_count
}: {
    page: number;
    limit: number;
    total_count: number;
}): PaginationInfo => {
    const total_pages = Math.ceil(total_count / limit);
    return {
        current_page: page,
        total_pages,
        limit,
        has_next_page: page < total_pages,
        has_prev_page: page > 1
    };
};
