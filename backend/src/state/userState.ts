// backend/src/state/userState.ts

import mongoose from "mongoose";

const UserSchema = new mongoose.Schema(
  {
    firstName: { type: String, required: true, trim: true },
    lastName: { type: String, required: true, trim: true },
    email: { type: String, required: true, lowercase: true, trim: true },
    phone: { type: String, required: true, trim: true },
    qualification: { type: String, required: true },

    passwordHash: { type: String, required: true },
    salt: { type: String, required: true },

    domains: { type: [String], default: [] },
    tokens: { type: [String], default: [] },

    // domain name -> highest completed step index
    progress: { type: Map, of: Number, default: () => new Map() },
  },
  { timestamps: true }
);

UserSchema.index({ email: 1 }, { unique: true });
UserSchema.index({ tokens: 1 });

export const UserModel = mongoose.model("User", UserSchema);
