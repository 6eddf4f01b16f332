import mongoose, { Model, Schema, Types } from 'mongoose';
import { allowedLocations } from '../services/bucketing';

export interface IReview {
  name: string;        // what was purchased
  location: string;    // where it was purchased
  rating: number;      // 1-5
  favorite: boolean;
  review: string | null;
  deleted: boolean;
}

export type ReviewLean = IReview & {
  _id: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const ReviewSchema = new Schema<IReview>(
  {
    name: { type: String, required: true, trim: true, unique: true },
    location: { type: String, required: true, enum: [...allowedLocations()] },
    rating: {
      type: Number,
      required: true,
      min: 1,
      max: 5,
      validate: {
        validator: Number.isInteger,
        message: 'Rating must be an integer from 1-5',
      },
    },
    favorite: { type: Boolean, required: true, default: false },
    review: { type: String, default: null },
    deleted: { type: Boolean, required: true, default: false, index: true },
  },
  { timestamps: true }
);

// Favorites listing filters on both flags and sorts by creation.
ReviewSchema.index({ deleted: 1, favorite: 1, createdAt: 1 });

const Review: Model<IReview> = mongoose.models.Review || mongoose.model<IReview>('Review', ReviewSchema);

export default Review;
