/** Process-wide rental wiring: Mongo store, lifecycle manager, expiry sweeper. */
import { createRentalLifecycle } from "./lifecycle.js";
import { createMongoRentalStore } from "./mongoStore.js";
import { createExpirySweeper } from "./sweeper.js";
import { env } from "../../config/env.js";
import { userAccounts } from "../users/service.js";

export const rentalStore = createMongoRentalStore();

export const rentalLifecycle = createRentalLifecycle({ store: rentalStore, accounts: userAccounts });

export const expirySweeper = createExpirySweeper({
  store: rentalStore,
  lifecycle: rentalLifecycle,
  windowMinutes: env.RENTAL_PAYMENT_WINDOW_MINUTES,
  intervalMs: env.RENTAL_SWEEP_INTERVAL_MS,
});
