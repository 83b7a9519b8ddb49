import { Router } from "express";

import { browseCarsQuery } from "./schemas.js";
import { browseCars, getCar } from "./service.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam, objectId } from "../../utils/ids.js";
import { listBrands } from "../brands/service.js";
import { listCarModels } from "../carmodels/service.js";

/** Public catalog: browse available cars, look one up. */
export const carsRouter = Router();

carsRouter.get(
  "/",
  asyncHandler(async (req, res) => {
    const q = browseCarsQuery.parse(req.query);
    const out = await browseCars(q);
    jsonOk(res, { ...out, sortOrder: q.sortOrder });
  })
);

carsRouter.get(
  "/:id",
  asyncHandler(async (req, res) => {
    const { id } = IdParam.parse(req.params);
    jsonOk(res, { car: await getCar(id) });
  })
);

/** Lookup lists for dependent selects (brand -> models). */
export const catalogRouter = Router();

catalogRouter.get(
  "/brands",
  asyncHandler(async (_req, res) => {
    jsonOk(res, { items: await listBrands() });
  })
);

catalogRouter.get(
  "/models",
  asyncHandler(async (req, res) => {
    const brandId = objectId.optional().parse(req.query.brandId);
    jsonOk(res, { items: await listCarModels({ brandId, sortDir: "asc" }) });
  })
);

export default carsRouter;
