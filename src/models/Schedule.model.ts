import mongoose, { Schema } from 'mongoose';
import { Schedule } from '../types';

const scheduleSchema = new Schema<Schedule>(
  {
    scheduleId: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    jobId: {
      type: String,
      required: true,
    },
    clusterId: {
      type: String,
      required: true,
      index: true,
    },
    externalJobId: {
      type: String,
      default: null,
    },
    owner: {
      type: String,
      required: true,
    },
    active: {
      type: Boolean,
      default: true,
    },
    dispatchStartedAt: {
      type: Date,
      default: null,
    },
    deletedAt: Date,
  },
  {
    timestamps: true,
  },
);

// At most one active schedule per job, enforced by the database as well.
scheduleSchema.index(
  { jobId: 1 },
  { unique: true, partialFilterExpression: { active: true }, name: 'uniq_active_schedule_per_job' },
);
scheduleSchema.index({ jobId: 1, active: 1 });
scheduleSchema.index({ clusterId: 1, active: 1 });

export const ScheduleModel = mongoose.model<Schedule>('Schedule', scheduleSchema);
