import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
} from 'typeorm';
import { BuildingEntity } from '../buildings/building.entity';

@Entity('organizations')
export class OrganizationEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'building_id', type: 'uuid' })
  buildingId!: string;

  @ManyToOne(() => BuildingEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'building_id' })
  building?: BuildingEntity;

  @Column({ length: 255 })
  name!: string;

  @Column('text', { name: 'phone_numbers', array: true, default: () => "'{}'" })
  phoneNumbers!: string[];
}
