// apps/api/src/messages/message.entity.ts
import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';
import { Expose } from 'class-transformer';

@Entity('messages')
export class Message {
  // Autoincrement: ids are never handed out twice, even after a delete.
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  text!: string;

  @CreateDateColumn({ name: 'created_at', update: false })
  @Expose({ name: 'created_at' })
  createdAt!: Date;
}
