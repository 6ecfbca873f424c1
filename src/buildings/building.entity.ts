import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('buildings')
export class BuildingEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column('text')
  address!: string;

  @Column('double precision')
  latitude!: number;

  @Column('double precision')
  longitude!: number;
}
