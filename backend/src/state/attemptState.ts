// backend/src/state/attemptState.ts

import mongoose from "mongoose";

// Append-only: attempts are created once and never updated.
const AttemptSchema = new mongoose.Schema(
  {
    userId: { type: String, required: true },
    domain: { type: String, required: true },
    stepIndex: { type: Number, required: true },
    score: { type: Number, required: true },
    total: { type: Number, required: true },
    passed: { type: Boolean, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

AttemptSchema.index({ userId: 1, createdAt: 1 });

export const AttemptModel = mongoose.model("Attempt", AttemptSchema);
