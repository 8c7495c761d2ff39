// backend/src/storage/learningUnitStore.ts

import { requireMongo } from "../db/mongo";
import { LearningUnitModel } from "../state/learningUnitState";
import type { LearningUnitStore } from "../types";

export const mongoLearningUnitStore: LearningUnitStore = {
  async insertMany(units) {
    requireMongo();
    if (units.length === 0) return 0;
    const inserted = await LearningUnitModel.insertMany(units.map(({ id, ...unit }) => ({ _id: id, ...unit })));
    return inserted.length;
  },
};
