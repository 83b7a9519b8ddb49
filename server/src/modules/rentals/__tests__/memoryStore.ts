/**
 * In-process RentalStore for tests. Transactions interleave: every unit-of-work call
 * yields a turn, reads see the latest written state, and each write is atomic per
 * document (like a filtered Mongo update). A transaction that throws undoes its own
 * writes in reverse order.
 */
import type { CarStatus, RentalStatus } from "../../../domain/enums.js";
import type {
  AccountDirectory,
  CarSnapshot,
  RentalRecord,
  RentalStore,
  RentalUnitOfWork,
} from "../store.js";

export type MemoryStore = RentalStore & {
  car(id: string): CarSnapshot | undefined;
  rental(id: string): RentalRecord | undefined;
  rentals(): RentalRecord[];
  putCar(car: CarSnapshot): void;
  putRental(rental: RentalRecord): void;
  /** next insertRental throws this */
  faults: { insertRental?: Error };
};

type Undo = () => void;

// one round trip to the "server"
const turn = () => Promise.resolve();

function restore<V>(map: Map<string, V>, id: string, before: V | undefined): Undo {
  return () => {
    if (before === undefined) map.delete(id);
    else map.set(id, before);
  };
}

function unitOfWork(
  cars: Map<string, CarSnapshot>,
  rentals: Map<string, RentalRecord>,
  nextId: () => string,
  faults: MemoryStore["faults"],
  undo: Undo[]
): RentalUnitOfWork {
  return {
    async getCar(carId) {
      await turn();
      const car = cars.get(carId);
      return car ? { ...car } : null;
    },
    async transitionCar(carId: string, from: readonly CarStatus[], to: CarStatus) {
      await turn();
      const car = cars.get(carId);
      if (!car || !from.includes(car.status)) return false;
      undo.push(restore(cars, carId, car));
      cars.set(carId, { ...car, status: to });
      return true;
    },
    async insertRental(input) {
      await turn();
      if (faults.insertRental) {
        const err = faults.insertRental;
        faults.insertRental = undefined;
        throw err;
      }
      const rental: RentalRecord = { ...input, id: nextId() };
      undo.push(restore(rentals, rental.id, undefined));
      rentals.set(rental.id, rental);
      return { ...rental };
    },
    async getRental(rentalId) {
      await turn();
      const rental = rentals.get(rentalId);
      return rental ? { ...rental } : null;
    },
    async transitionRental(rentalId: string, from: RentalStatus, to: RentalStatus) {
      await turn();
      const rental = rentals.get(rentalId);
      if (!rental || rental.status !== from) return null;
      const next = { ...rental, status: to };
      undo.push(restore(rentals, rentalId, rental));
      rentals.set(rentalId, next);
      return { ...next };
    },
    async deleteRental(rentalId, status) {
      await turn();
      const rental = rentals.get(rentalId);
      if (!rental || rental.status !== status) return false;
      undo.push(restore(rentals, rentalId, rental));
      return rentals.delete(rentalId);
    },
    async countLiveRentalsForCar(carId, exceptRentalId) {
      await turn();
      let n = 0;
      for (const r of rentals.values()) {
        if (r.carId !== carId || r.id === exceptRentalId) continue;
        if (r.status === "PENDING_PAYMENT" || r.status === "PAID") n += 1;
      }
      return n;
    },
  };
}

export function createMemoryStore(seed: { cars?: CarSnapshot[] } = {}): MemoryStore {
  const cars = new Map<string, CarSnapshot>((seed.cars ?? []).map((c) => [c.id, { ...c }]));
  const rentals = new Map<string, RentalRecord>();
  let seq = 0;
  const faults: MemoryStore["faults"] = {};

  return {
    faults,
    async transaction<T>(work: (uow: RentalUnitOfWork) => Promise<T>): Promise<T> {
      const undo: Undo[] = [];
      try {
        return await work(unitOfWork(cars, rentals, () => `rental-${++seq}`, faults, undo));
      } catch (err: unknown) {
        for (const step of undo.reverse()) step();
        throw err;
      }
    },
    async listPendingPayment() {
      return [...rentals.values()]
        .filter((r) => r.status === "PENDING_PAYMENT")
        .map((r) => ({ id: r.id, createdAt: r.createdAt }));
    },
    car: (id) => cars.get(id),
    rental: (id) => rentals.get(id),
    rentals: () => [...rentals.values()],
    putCar: (car) => {
      cars.set(car.id, { ...car });
    },
    putRental: (rental) => {
      rentals.set(rental.id, { ...rental });
    },
  };
}

export const USER_EMAIL = "driver@example.com";
export const USER_ID = "user-1";

export const accounts: AccountDirectory = {
  async findAccount(identity) {
    return identity === USER_EMAIL || identity === USER_ID ? { id: USER_ID } : null;
  },
};
