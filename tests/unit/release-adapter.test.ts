import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { findBuyerParty, findSupplierParties, normalizeRelease } from '../../src/pipeline/ocds/releaseAdapter.js';
import { RELEASE_COLUMNS } from '../../src/records/schema.js';
import type { ReleaseSource } from '../../src/types.js';

const source: ReleaseSource = { sourceFile: 'batch.csv', rowIndex: 3, uri: 'https://example.test/fallback' };

function loadFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(process.cwd(), 'tests/fixtures/releases', name), 'utf8'));
}

describe('normalizeRelease', () => {
  it('projects the minimal buyer/supplier release', () => {
    const pkg = {
      releases: [
        {
          parties: [
            { id: 'B1', name: 'Buyer', roles: ['buyer'] },
            { id: 'S1', name: 'Supplier', roles: ['supplier'] },
          ],
          buyer: { id: 'B1' },
          awards: [{ suppliers: [{ id: 'S1' }] }],
        },
      ],
    };
    const record = normalizeRelease(pkg, source);
    expect(record.buyer_id).toBe('B1');
    expect(record.buyer_roles).toBe('buyer');
    expect(record.supplier_party_ids).toBe('S1');
    expect(record.supplier_party_names).toBe('Supplier');
    expect(record.award_suppliers_ids).toBe('S1');
    expect(record.award_suppliers_names).toBeNull();
  });

  it('keeps buyer reference fields when no party matches', () => {
    const pkg = { releases: [{ buyer: { id: 'B9', name: 'Orphan Buyer' }, parties: [{ id: 'B1', roles: ['buyer'] }] }] };
    const record = normalizeRelease(pkg, source);
    expect(record.buyer_id).toBe('B9');
    expect(record.buyer_name).toBe('Orphan Buyer');
    expect(record.buyer_legalName).toBeNull();
    expect(record.buyer_roles).toBeNull();
  });

  it('returns an all-null projection for an empty package', () => {
    const record = normalizeRelease({}, source);
    expect(Object.keys(record)).toEqual([...RELEASE_COLUMNS]);
    expect(record.status).toBe('ok');
    expect(record.uri).toBe('https://example.test/fallback');
    expect(record.source_file).toBe('batch.csv');
    expect(record.row_index).toBe(3);
    expect(record.notice_type_group).toBe('OTHER');
    expect(record.ocid).toBeNull();
    expect(record.tender_title).toBeNull();
  });

  it('reads the first release and first award only', () => {
    const pkg = {
      releases: [
        { id: 'r1', awards: [{ id: 'A1' }, { id: 'A2' }] },
        { id: 'r2', awards: [{ id: 'A3' }] },
      ],
    };
    const record = normalizeRelease(pkg, source);
    expect(record.release_id).toBe('r1');
    expect(record.award_id).toBe('A1');
  });

  it('joins parallel document columns independently', () => {
    const pkg = {
      releases: [
        {
          planning: {
            documents: [
              { id: 'P1', format: 'text/html' },
              { id: 'P2' },
              { id: 'P3', format: 'text/html' },
            ],
          },
        },
      ],
    };
    const record = normalizeRelease(pkg, source);
    expect(record.planning_document_ids).toBe('P1|P2|P3');
    expect(record.planning_document_formats).toBe('text/html');
  });

  it('takes single delivery values from the first item and _all values from every item', () => {
    const pkg = {
      releases: [
        {
          tender: {
            items: [
              { id: 'i1', deliveryAddresses: [{ region: '' }, { region: 'North East', postalCode: 'NE1' }] },
              { id: 'i2', deliveryAddresses: [{ region: 'Wales', countryName: 'United Kingdom' }] },
            ],
          },
        },
      ],
    };
    const record = normalizeRelease(pkg, source);
    expect(record.tender_item_ids).toBe('i1|i2');
    expect(record.delivery_region).toBe('North East');
    expect(record.delivery_postalCode).toBe('NE1');
    expect(record.delivery_country).toBeNull();
    expect(record.tender_delivery_regions_all).toBe('North East|Wales');
    expect(record.tender_delivery_countryNames_all).toBe('United Kingdom');
  });

  it('classifies by release tags', () => {
    const record = normalizeRelease({ releases: [{ tag: ['tender', 'awardUpdate'] }] }, source);
    expect(record.release_tag).toBe('tender');
    expect(record.release_tags_all).toBe('tender|awardUpdate');
    expect(record.notice_type_group).toBe('MODIFICATION');
  });

  it('normalizes a full release package', () => {
    const record = normalizeRelease(loadFixture('cf-release.json'), source);

    expect(record.uri).toBe('https://example.test/Published/Notice/OCDS/release-1');
    expect(record.publishedDate).toBe('2024-02-01T12:00:00Z');
    expect(record.ocid).toBe('ocds-test-0001');
    expect(record.notice_type_group).toBe('CONTRACT_AWARD');
    expect(record.publisher_name).toBe('Example Publisher');
    expect(record.extensions).toBe('https://example.test/ext/a.json|https://example.test/ext/b.json');

    expect(record.tender_id).toBe('T1');
    expect(record.value_amount).toBe(50000);
    expect(record.value_currency).toBe('GBP');
    expect(record.cpv_id).toBe('77314000');
    expect(record.tender_endDate).toBe('2023-11-30T12:00:00Z');
    expect(record.delivery_region).toBe('South West');
    expect(record.tender_notice_url).toBe('https://example.test/tender-notice');
    expect(record.tender_notice_description).toBe('Opportunity notice');

    expect(record.buyer_name).toBe('Example District Council');
    expect(record.buyer_identifier_id).toBe('GOR-1');
    expect(record.buyer_contact_email).toBe('buyer@example.test');
    expect(record.buyer_details_url).toBe('https://council.example.test');

    expect(record.supplier_legalNames).toBe('Green Spaces Limited');
    expect(record.supplier_streetAddresses).toBeNull();
    expect(record.supplier_scales).toBe('sme');
    expect(record.supplier_vcse_flags).toBe('false');
    expect(record.supplier_roles).toBe('supplier');

    expect(record.award_id).toBe('A1');
    expect(record.award_value_amount).toBe(48000);
    expect(record.award_suppliers_names).toBe('Green Spaces Ltd');
    expect(record.award_notice_url).toBe('https://example.test/award-notice');
    expect(record.award_notice_format).toBe('text/html');
    expect(record.award_document_ids).toBe('D2');
  });
});

describe('party lookups', () => {
  const release = {
    buyer: { id: 'B1' },
    parties: [
      { id: 'S1', roles: ['supplier'] },
      { id: 'B1', roles: ['buyer', 'supplier'] },
      'not-a-party',
    ],
  };

  it('matches the buyer by id', () => {
    expect(findBuyerParty(release)).toEqual({ id: 'B1', roles: ['buyer', 'supplier'] });
    expect(findBuyerParty({ parties: release.parties })).toBeNull();
  });

  it('collects every supplier-role party in order', () => {
    expect(findSupplierParties(release).map((party) => party.id)).toEqual(['S1', 'B1']);
  });
});
