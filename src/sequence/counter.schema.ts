import { Schema } from 'mongoose';

export interface Counter {
  _id: string;
  seq: number;
}

export const CounterSchema = new Schema<Counter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  {
    versionKey: false,
  },
);
