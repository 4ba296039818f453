import mongoose, { Schema } from 'mongoose';
import { Job, JOB_STATUSES } from '../types';

const jobSchema = new Schema<Job>(
  {
    jobId: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    status: {
      type: String,
      enum: [...JOB_STATUSES],
      default: 'PENDING',
      required: true,
    },
    owner: {
      type: String,
      required: true,
      index: true,
    },
    spec: {
      type: Schema.Types.Mixed,
      required: [true, 'Job spec is required'],
    },
    cancelRequested: {
      type: Boolean,
      default: false,
    },
    error: String,
  },
  {
    timestamps: true,
    minimize: false,
  },
);

// Indexes
jobSchema.index({ owner: 1, status: 1 });

export const JobModel = mongoose.model<Job>('Job', jobSchema);
