import { Router } from "express";

import { auditQuery, listUsersQuery, patchUserBody } from "./schemas.js";
import { adminDeleteUser, adminListUsers, adminSetRole, audited, dashboard } from "./service.js";
import { carCities } from "../../config/env.js";
import { CAR_STATUSES } from "../../domain/enums.js";
import { requireAuth, requireRole, getAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/ids.js";
import { listAudit } from "../audit/service.js";
import { brandBody } from "../brands/schemas.js";
import { createBrand, deleteBrand, listBrands, renameBrand } from "../brands/service.js";
import { carModelBody, carModelPatch, listCarModelsQuery } from "../carmodels/schemas.js";
import { createCarModel, deleteCarModel, listCarModels, updateCarModel } from "../carmodels/service.js";
import { ADMIN_CAR_STATUSES, adminCarsQuery, carBody, carPatch } from "../cars/schemas.js";
import { adminListCars, createCar, deleteCar, getCar, updateCar } from "../cars/service.js";
import { adminRentalsQuery } from "../rentals/schemas.js";
import { adminListRentals, cancelRentalAs } from "../rentals/service.js";

const adminRouter = Router();

// all admin routes require admin role
adminRouter.use(requireAuth, requireRole("ADMIN"));

adminRouter.get(
  "/dashboard",
  asyncHandler(async (_req, res) => {
    jsonOk(res, await dashboard());
  })
);

/* ----------------------------- brands ----------------------------- */

adminRouter.get(
  "/brands",
  asyncHandler(async (_req, res) => {
    jsonOk(res, { items: await listBrands() });
  })
);

adminRouter.post(
  "/brands",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const body = brandBody.parse(req.body);
    const brand = await createBrand(body);
    await audited(admin.userId, "brand.create", { type: "brand", id: brand.id }, async () => brand);
    jsonOk(res, { brand }, 201);
  })
);

adminRouter.patch(
  "/brands/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const body = brandBody.parse(req.body);
    const brand = await audited(admin.userId, "brand.update", { type: "brand", id }, () => renameBrand(id, body));
    jsonOk(res, { brand });
  })
);

adminRouter.delete(
  "/brands/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const brand = await audited(admin.userId, "brand.delete", { type: "brand", id }, () => deleteBrand(id));
    jsonOk(res, { ok: true, brand });
  })
);

/* ----------------------------- models ----------------------------- */

adminRouter.get(
  "/models",
  asyncHandler(async (req, res) => {
    const q = listCarModelsQuery.parse(req.query);
    jsonOk(res, { items: await listCarModels(q) });
  })
);

adminRouter.post(
  "/models",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const body = carModelBody.parse(req.body);
    const model = await createCarModel(body);
    await audited(admin.userId, "model.create", { type: "model", id: model.id }, async () => model);
    jsonOk(res, { model }, 201);
  })
);

adminRouter.patch(
  "/models/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const body = carModelPatch.parse(req.body);
    const model = await audited(admin.userId, "model.update", { type: "model", id }, () => updateCarModel(id, body));
    jsonOk(res, { model });
  })
);

adminRouter.delete(
  "/models/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const model = await audited(admin.userId, "model.delete", { type: "model", id }, () => deleteCarModel(id));
    jsonOk(res, { ok: true, model });
  })
);

/* ------------------------------ cars ------------------------------ */

adminRouter.get(
  "/cars/options",
  asyncHandler(async (_req, res) => {
    jsonOk(res, { cities: carCities, statuses: CAR_STATUSES, editableStatuses: ADMIN_CAR_STATUSES });
  })
);

adminRouter.get(
  "/cars",
  asyncHandler(async (req, res) => {
    const q = adminCarsQuery.parse(req.query);
    jsonOk(res, { items: await adminListCars(q) });
  })
);

adminRouter.get(
  "/cars/:id",
  asyncHandler(async (req, res) => {
    const { id } = IdParam.parse(req.params);
    jsonOk(res, { car: await getCar(id) });
  })
);

adminRouter.post(
  "/cars",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const body = carBody.parse(req.body);
    const car = await createCar(body);
    await audited(admin.userId, "car.create", { type: "car", id: car.id }, async () => car);
    jsonOk(res, { car }, 201);
  })
);

adminRouter.patch(
  "/cars/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const body = carPatch.parse(req.body);
    const car = await audited(
      admin.userId,
      "car.update",
      { type: "car", id },
      () => updateCar(id, body),
      (after) => ({ patch: body, after })
    );
    jsonOk(res, { car });
  })
);

adminRouter.delete(
  "/cars/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const car = await audited(admin.userId, "car.delete", { type: "car", id }, () => deleteCar(id));
    jsonOk(res, { ok: true, car });
  })
);

/* ------------------------------ users ----------------------------- */

adminRouter.get(
  "/users",
  asyncHandler(async (req, res) => {
    const q = listUsersQuery.parse(req.query);
    jsonOk(res, { items: await adminListUsers(q) });
  })
);

adminRouter.patch(
  "/users/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const body = patchUserBody.parse(req.body);
    const user = await adminSetRole(admin.userId, id, body.role);
    jsonOk(res, { ok: true, user });
  })
);

adminRouter.delete(
  "/users/:id",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const user = await adminDeleteUser(admin.userId, id);
    jsonOk(res, { ok: true, user });
  })
);

/* ----------------------------- rentals ---------------------------- */

adminRouter.get(
  "/rentals",
  asyncHandler(async (req, res) => {
    const q = adminRentalsQuery.parse(req.query);
    jsonOk(res, { items: await adminListRentals(q) });
  })
);

adminRouter.post(
  "/rentals/:id/cancel",
  asyncHandler(async (req, res) => {
    const admin = getAuth(req);
    const { id } = IdParam.parse(req.params);
    const out = await audited(admin.userId, "rental.cancel", { type: "rental", id }, () =>
      cancelRentalAs(admin, id)
    );
    jsonOk(res, out);
  })
);

/* ------------------------------ audit ----------------------------- */

adminRouter.get(
  "/audit",
  asyncHandler(async (req, res) => {
    const q = auditQuery.parse(req.query);
    jsonOk(res, { items: await listAudit(q) });
  })
);

export default adminRouter;
