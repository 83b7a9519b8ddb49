import { Router } from "express";

import { createRentalBody, paymentBody } from "./schemas.js";
import { bookRental, cancelRentalAs, listMyRentals, payRental } from "./service.js";
import { logger } from "../../config/logger.js";
import { getAuth, requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { IdParam } from "../../utils/ids.js";

const rentalsRouter = Router();

rentalsRouter.use(requireAuth);

rentalsRouter.post(
  "/",
  requireRole("USER"),
  asyncHandler(async (req, res) => {
    const body = createRentalBody.parse(req.body);
    const rental = await bookRental(getAuth(req), body);
    jsonOk(res, { rental }, 201);
  })
);

rentalsRouter.get(
  "/mine",
  asyncHandler(async (req, res) => {
    const { userId } = getAuth(req);
    jsonOk(res, { items: await listMyRentals(userId) });
  })
);

rentalsRouter.post(
  "/:id/pay",
  asyncHandler(async (req, res) => {
    const { id } = IdParam.parse(req.params);
    const card = paymentBody.parse(req.body);
    logger.info("rental.payment_submitted", { rentalId: id, last4: card.cardNumber.slice(-4) });
    const rental = await payRental(getAuth(req), id);
    jsonOk(res, { rental });
  })
);

rentalsRouter.post(
  "/:id/cancel",
  asyncHandler(async (req, res) => {
    const { id } = IdParam.parse(req.params);
    jsonOk(res, await cancelRentalAs(getAuth(req), id));
  })
);

export default rentalsRouter;
