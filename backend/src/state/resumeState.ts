// backend/src/state/resumeState.ts

import mongoose from "mongoose";

const EducationSchema = new mongoose.Schema(
  {
    degree: { type: String, default: "" },
    institution: { type: String, default: "" },
    year: { type: String, default: "" },
  },
  { _id: false }
);

const ExperienceSchema = new mongoose.Schema(
  {
    role: { type: String, default: "" },
    company: { type: String, default: "" },
    duration: { type: String, default: "" },
    details: { type: String, default: "" },
  },
  { _id: false }
);

const ProjectSchema = new mongoose.Schema(
  {
    name: { type: String, default: "" },
    description: { type: String, default: "" },
  },
  { _id: false }
);

const ResumeSchema = new mongoose.Schema(
  {
    userId: { type: String, required: true },
    summary: { type: String, default: "" },
    skills: { type: [String], default: [] },
    education: { type: [EducationSchema], default: [] },
    experience: { type: [ExperienceSchema], default: [] },
    projects: { type: [ProjectSchema], default: [] },
  },
  { timestamps: true }
);

ResumeSchema.index({ userId: 1 }, { unique: true });

export const ResumeModel = mongoose.model("Resume", ResumeSchema);
