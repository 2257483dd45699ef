import { z } from 'zod';

/**
 * Field order of a catalogue line.
 */
export const WEAPON_RECORD_FIELDS = [
  'name',
  'price',
  'damage',
  'fireRate',
  'magazineSize',
  'falloff',
  'accurateRange',
  'recoil',
] as const;

/**
 * Zod schema validating one catalogue line after it was split into fields.
 * Numeric fields arrive as strings and are coerced.
 */
export const WeaponRecordSchema = z
  .object({
    name: z.string().min(1, 'Weapon name is required'),
    price: z.coerce.number().int('Price must be a whole number').min(0, 'Price cannot be negative'),
    damage: z.coerce.number().int('Damage must be a whole number').min(0, 'Damage cannot be negative'),
    fireRate: z.coerce.number().finite().min(0, 'Fire rate cannot be negative'),
    magazineSize: z.coerce.number().int('Magazine size must be a whole number').min(0),
    falloff: z.coerce.number().int('Falloff must be a whole number').min(0),
    accurateRange: z.coerce.number().finite().min(0, 'Accurate range cannot be negative'),
    recoil: z.coerce.number().finite().min(0, 'Recoil cannot be negative'),
  })
  .refine((record) => record.falloff + record.recoil !== 0, {
    message: 'Falloff and recoil cannot both be zero',
    path: ['recoil'],
  });

/**
 * Type produced by a successful WeaponRecordSchema parse.
 */
export type ParsedWeaponRecord = z.infer<typeof WeaponRecordSchema>;
