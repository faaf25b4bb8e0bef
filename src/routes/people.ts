// src/routes/people.ts
import { peopleController } from "../controllers/peopleController";
import { createRouter } from "../lib/handler";
import { methodNotAllowed } from "../middlewares/errorHandler";
import { resource } from "../middlewares/requestContext";
import type { PeopleRepository } from "../models/personModel";

export function peopleRoutes(repo: PeopleRepository) {
  const router = createRouter();
  const people = peopleController(repo);
  const named = resource("people");

  router
    .route("/people{.:export}")
    .all(named)
    .get(people.list)
    .post(people.create)
    .all(methodNotAllowed);

  router.route("/people/search{.:export}").all(named).get(people.search).all(methodNotAllowed);

  router.route("/people/private").all(named).get(people.restricted).all(methodNotAllowed);

  router.route("/people/:id{.:export}").all(named).get(people.show).all(methodNotAllowed);

  return router;
}
