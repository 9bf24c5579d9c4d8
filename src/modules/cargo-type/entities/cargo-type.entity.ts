import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * CargoType entity - registered shipment category
 */
@Entity('cargo_types')
@Unique('unique_cargo_type_name', ['name'])
export class CargoType {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  name!: string;

  toSafeObject() {
    return {
      id: this.id,
      name: this.name,
    };
  }
}
