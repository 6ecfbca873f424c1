import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { QueryFilter } from '../../common/specification/query-filter';
import { CoordinateBox, parseCoordinateBox } from '../../common/value-objects/coordinate';

/** Организации, связанные хотя бы с одним из видов деятельности */
export class ActivityIdInListFilter extends QueryFilter<readonly string[]> {
  apply<M extends ObjectLiteral>(
    query: SelectQueryBuilder<M>,
    key: string,
  ): SelectQueryBuilder<M> {
    if (this.value.length === 0) {
      return query.andWhere('1 = 0');
    }

    // Подзапрос вместо join: строки организаций не дублируются
    return query.andWhere(
      `${query.alias}.id IN (` +
        `SELECT ${key}_link.organization_id FROM organization_activities ${key}_link ` +
        `WHERE ${key}_link.activity_id IN (:...${key}))`,
      { [key]: [...this.value] },
    );
  }
}

/**
 * Как {@link ActivityIdInListFilter}, но каждая деятельность
 * раскрывается во все поддерево рекурсивным CTE.
 */
export class ActivityIdInListWithChildrenFilter extends QueryFilter<readonly string[]> {
  apply<M extends ObjectLiteral>(
    query: SelectQueryBuilder<M>,
    key: string,
  ): SelectQueryBuilder<M> {
    if (this.value.length === 0) {
      return query.andWhere('1 = 0');
    }

    const tree = `${key}_tree`;
    const descendants =
      `WITH RECURSIVE ${tree}(id) AS (` +
      `SELECT root.id FROM activities root WHERE root.id IN (:...${key}) ` +
      `UNION ALL ` +
      `SELECT child.id FROM activities child JOIN ${tree} ON child.parent_id = ${tree}.id` +
      `) SELECT id FROM ${tree}`;

    return query.andWhere(
      `${query.alias}.id IN (` +
        `SELECT ${key}_link.organization_id FROM organization_activities ${key}_link ` +
        `WHERE ${key}_link.activity_id IN (${descendants}))`,
      { [key]: [...this.value] },
    );
  }
}

/** Прямоугольник `minLat,minLon;maxLat,maxLon` по координатам здания, границы включены */
export class CoordinateFilter extends QueryFilter<CoordinateBox> {
  static fromString(value: string): CoordinateFilter {
    return new CoordinateFilter(parseCoordinateBox(value));
  }

  apply<M extends ObjectLiteral>(
    query: SelectQueryBuilder<M>,
    key: string,
  ): SelectQueryBuilder<M> {
    const building = `${key}_building`;
    const { min, max } = this.value;

    return query
      .innerJoin(`${query.alias}.building`, building)
      .andWhere(`${building}.latitude BETWEEN :${key}_min_lat AND :${key}_max_lat`, {
        [`${key}_min_lat`]: min.latitude,
        [`${key}_max_lat`]: max.latitude,
      })
      .andWhere(`${building}.longitude BETWEEN :${key}_min_lon AND :${key}_max_lon`, {
        [`${key}_min_lon`]: min.longitude,
        [`${key}_max_lon`]: max.longitude,
      });
  }
}
