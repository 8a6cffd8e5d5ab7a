import {
  Column,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { VerificationRecord } from './verification-record.entity';

export const MAILBOX_STATUSES = ['ACTIVE', 'EXPIRED', 'DELETED'] as const;
export type MailboxStatus = (typeof MAILBOX_STATUSES)[number];

/**
 * Short-lived mailbox provisioned on the mail server.
 * `createdAt` and `expiresAt` are stamped from the same clock reading.
 */
@Entity('mailboxes')
export class Mailbox {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  address!: string;

  @Column()
  localPart!: string;

  @Column()
  @Index()
  domain!: string;

  @Column({ type: 'varchar', default: 'ACTIVE' })
  @Index()
  status!: MailboxStatus;

  @Column({ type: 'timestamp' })
  createdAt!: Date;

  @Column({ type: 'timestamp' })
  @Index()
  expiresAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  expiredAt?: Date | null;

  @Column({ type: 'timestamp', nullable: true })
  @Index()
  deletedAt?: Date | null;

  @Column({ type: 'timestamp', nullable: true })
  lastScannedAt?: Date | null;

  // Lower bound for the next message listing.
  @Column({ type: 'timestamp', nullable: true })
  scanWatermarkAt?: Date | null;

  @OneToMany(() => VerificationRecord, (record) => record.mailbox)
  verifications?: VerificationRecord[];

  @UpdateDateColumn()
  updatedAt!: Date;
}
