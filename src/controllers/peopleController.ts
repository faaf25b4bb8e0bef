import assert from "node:assert";
import type { Request, Response } from "express";
import { HttpError } from "../lib/errors";
import type { PeopleRepository } from "../models/personModel";
import { createPersonSchema, paginationQuerySchema } from "../schemas";
import { parseWith } from "../middlewares/validate";
import { getArgument } from "../utils/args";
import { parsePagination } from "../utils/pagination";
import { finish } from "../utils/respond";

export function peopleController(repo: PeopleRepository) {
  return {
    /**
     * GET /people?limit=&offset=
     * Envelope: { people: [...], meta: { total, status, request } }
     */
    async list(req: Request, res: Response) {
      const { limit, offset } = parsePagination(parseWith(paginationQuerySchema, req.query));
      const rows = await repo.list({ limit, offset });
      await finish(req, res, rows);
    },

    /** GET /people/:id */
    async show(req: Request, res: Response) {
      const id = Number(req.params.id);
      assert(Number.isInteger(id) && id > 0, "id must be a positive integer");
      const person = await repo.get(id);
      if (!person) throw new HttpError(404, `person ${id} not found`);
      await finish(req, res, person);
    },

    /**
     * POST /people
     * body: { name, email? }
     */
    async create(req: Request, res: Response) {
      const input = parseWith(createPersonSchema, req.body);
      const person = await repo.create(input);
      res.status(201);
      await finish(req, res, person);
    },

    /** GET /people/search?name= */
    async search(req: Request, res: Response) {
      const name = getArgument(req, "name");
      const rows = await repo.searchByName(name);
      await finish(req, res, rows);
    },

    /** GET /people/private: always asks for credentials. */
    async restricted(_req: Request, _res: Response) {
      throw new HttpError(401, "credentials required");
    },
  };
}
