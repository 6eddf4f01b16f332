import mongoose, { Model, Schema, Types } from 'mongoose';

export interface IUser {
  username: string;
  passwordHash: string;
}

export type UserLean = IUser & {
  _id: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
};

const UserSchema = new Schema<IUser>(
  {
    username: { type: String, required: true, unique: true, trim: true },
    passwordHash: { type: String, required: true },
  },
  { timestamps: true }
);

const User: Model<IUser> = mongoose.models.User || mongoose.model<IUser>('User', UserSchema);

export default User;
