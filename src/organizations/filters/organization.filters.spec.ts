import { InvalidCoordinateBoxException } from '../../common/value-objects/value-object.exceptions';
import { createTestQueryBuilder } from '../../common/database/testing/query-builder.fixture';
import {
  ActivityIdInListFilter,
  ActivityIdInListWithChildrenFilter,
  CoordinateFilter,
} from './organization.filters';

describe('organization filters', () => {
  it('should match organizations linked to any of the activities', () => {
    const query = createTestQueryBuilder('organizations', 'organization');

    new ActivityIdInListFilter(['a1', 'a2']).apply(query.builder, 'filter_0');

    expect(query.andWhere).toHaveBeenCalledWith(
      'organization.id IN (SELECT filter_0_link.organization_id FROM organization_activities filter_0_link ' +
        'WHERE filter_0_link.activity_id IN (:...filter_0))',
      { filter_0: ['a1', 'a2'] },
    );
  });

  it('should expand activities with a recursive query', () => {
    const query = createTestQueryBuilder('organizations', 'organization');

    new ActivityIdInListWithChildrenFilter(['root']).apply(query.builder, 'filter_1');

    expect(query.andWhere).toHaveBeenCalledWith(
      'organization.id IN (SELECT filter_1_link.organization_id FROM organization_activities filter_1_link ' +
        'WHERE filter_1_link.activity_id IN (' +
        'WITH RECURSIVE filter_1_tree(id) AS (' +
        'SELECT root.id FROM activities root WHERE root.id IN (:...filter_1) ' +
        'UNION ALL ' +
        'SELECT child.id FROM activities child JOIN filter_1_tree ON child.parent_id = filter_1_tree.id' +
        ') SELECT id FROM filter_1_tree))',
      { filter_1: ['root'] },
    );
  });

  it('should match nothing for an empty activity list', () => {
    const query = createTestQueryBuilder('organizations', 'organization');

    new ActivityIdInListFilter([]).apply(query.builder, 'filter_0');

    expect(query.andWhere).toHaveBeenCalledWith('1 = 0');
  });

  it('should join the building and bound both axes', () => {
    const query = createTestQueryBuilder('organizations', 'organization');

    CoordinateFilter.fromString('55,37;56,38').apply(query.builder, 'filter_2');

    expect(query.innerJoin).toHaveBeenCalledWith('organization.building', 'filter_2_building');
    expect(query.andWhere).toHaveBeenNthCalledWith(
      1,
      'filter_2_building.latitude BETWEEN :filter_2_min_lat AND :filter_2_max_lat',
      { filter_2_min_lat: 55, filter_2_max_lat: 56 },
    );
    expect(query.andWhere).toHaveBeenNthCalledWith(
      2,
      'filter_2_building.longitude BETWEEN :filter_2_min_lon AND :filter_2_max_lon',
      { filter_2_min_lon: 37, filter_2_max_lon: 38 },
    );
  });

  it('should reject a malformed coordinate box', () => {
    expect(() => CoordinateFilter.fromString('55;37')).toThrow(InvalidCoordinateBoxException);
  });
});
