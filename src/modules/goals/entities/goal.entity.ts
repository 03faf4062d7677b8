import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { decimalTransformer } from '../../../database/decimal.transformer';
import { User } from '../../users/entities/user.entity';

export enum GoalStatus {
  IN_PROGRESS = 'in_progress',
  ACHIEVED = 'achieved',
  ABANDONED = 'abandoned',
}

@Entity('goals')
@Check('goal_date_check', '"end_date" >= "start_date"')
@Check(
  'goal_amount_check',
  '"current_amount" >= 0 AND "target_amount" >= 0 AND "current_amount" <= "target_amount"',
)
export class Goal {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  description!: string | null;

  @Column({ name: 'target_amount', type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  targetAmount!: number;

  @Column({
    name: 'current_amount',
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: 0,
    transformer: decimalTransformer,
  })
  currentAmount!: number;

  @Column({ name: 'start_date', type: 'date' })
  startDate!: string;

  @Column({ name: 'end_date', type: 'date' })
  endDate!: string;

  @Column({ type: 'simple-enum', enum: GoalStatus, default: GoalStatus.IN_PROGRESS })
  status!: GoalStatus;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
