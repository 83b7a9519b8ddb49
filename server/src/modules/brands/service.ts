import mongoose from "mongoose";

import { Brand } from "./model.js";
import { connectMongo } from "../../config/db.js";
import { IntegrityError, InvalidStateError, NotFoundError } from "../../utils/errors.js";
import { translateDuplicateKey } from "../../utils/mongoErrors.js";
import { Car } from "../cars/model.js";
import { CarModel } from "../carmodels/model.js";
import type { Ref } from "../cars/query.js";

const nameTaken = () => new IntegrityError("Brand with this name already exists", "BRAND_NAME_TAKEN");

function toRef(doc: { _id: unknown; name: string }): Ref {
  return { id: String(doc._id), name: doc.name };
}

export async function listBrands(): Promise<Ref[]> {
  await connectMongo();
  const docs = await Brand.find({}, { name: 1 }).collation({ locale: "en", strength: 2 }).sort({ name: 1 }).lean();
  return docs.map(toRef);
}

export async function getBrand(id: string): Promise<Ref> {
  await connectMongo();
  const doc = mongoose.isValidObjectId(id) ? await Brand.findById(id, { name: 1 }).lean() : null;
  if (!doc) throw new NotFoundError("Brand not found", "BRAND_NOT_FOUND");
  return toRef(doc);
}

export async function createBrand(input: { name: string }): Promise<Ref> {
  await connectMongo();
  const doc = await translateDuplicateKey(Brand.create({ name: input.name }), nameTaken);
  return toRef(doc);
}

export async function renameBrand(id: string, input: { name: string }): Promise<Ref> {
  await connectMongo();
  const doc = await translateDuplicateKey(
    Brand.findByIdAndUpdate(id, { $set: { name: input.name } }, { new: true, runValidators: true }).lean().exec(),
    nameTaken
  );
  if (!doc) throw new NotFoundError("Brand not found", "BRAND_NOT_FOUND");
  return toRef(doc);
}

/** Refused while models or cars still point at the brand. */
export async function deleteBrand(id: string): Promise<Ref> {
  const brand = await getBrand(id);
  const [models, cars] = await Promise.all([
    CarModel.countDocuments({ brandId: id }),
    Car.countDocuments({ brandId: id }),
  ]);
  if (models > 0 || cars > 0) {
    throw new InvalidStateError(
      `Brand "${brand.name}" is used by ${models} model(s) and ${cars} car(s)`,
      { models, cars }
    );
  }
  await Brand.deleteOne({ _id: id });
  return brand;
}
