import { describe, it, expect } from 'vitest';
import { IndexedField, defineDataPoint, snapshotDataPoint } from '../src/models/data-point.js';
import { InvalidDataPointError } from '../src/errors.js';

interface Article {
  title: string;
  body: string;
  pages?: number;
  publishedAt?: Date;
}

const ArticleModel = defineDataPoint<Article>('Article', {
  indexFields: ['title'],
  embeddableFields: ['title', 'body', 'pages'],
});

describe('defineDataPoint', () => {
  it('should refuse a type without index fields', () => {
    expect(() => defineDataPoint<Article>('Broken', { indexFields: [] })).toThrow(InvalidDataPointError);
  });

  it('should generate a time-ordered id when none is given', () => {
    const point = ArticleModel.create({ title: 'Soil', body: 'Loam is soil' });
    expect(point.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(point.type).toBe('Article');
  });

  it('should refuse an empty id', () => {
    expect(() => ArticleModel.create({ title: 'Soil', body: '' }, { id: '' })).toThrow(InvalidDataPointError);
  });

  it('should join the embeddable fields, skipping empty ones', () => {
    const point = ArticleModel.create({ title: 'Soil', body: '', pages: 12 }, { id: 'a1' });
    expect(point.embeddableText).toBe('Soil 12');
    expect(point.indexText).toBe('Soil');
    expect(point.indexFields).toEqual(['title']);
  });

  it('should embed the first index field by default', () => {
    const Note = defineDataPoint<{ text: string; author: string }>('Note', { indexFields: ['text', 'author'] });
    expect(Note.create({ text: 'hello', author: 'sam' }).embeddableText).toBe('hello');
  });
});

describe('snapshotDataPoint', () => {
  it('should store fields with the id and type as plain JSON', () => {
    const point = ArticleModel.create(
      { title: 'Soil', body: 'Loam', publishedAt: new Date('2024-01-02T03:04:05.000Z') },
      { id: 'a1' },
    );
    expect(snapshotDataPoint(point)).toEqual({
      title: 'Soil',
      body: 'Loam',
      publishedAt: '2024-01-02T03:04:05.000Z',
      id: 'a1',
      type: 'Article',
    });
  });

  it('should include nodeset tags only when present', () => {
    const point = ArticleModel.create({ title: 'Soil', body: 'Loam' }, { id: 'a1', belongsToSet: ['garden'] });
    expect(snapshotDataPoint(point).belongsToSet).toEqual(['garden']);
  });
});

describe('IndexedField', () => {
  it('should carry the text of one field', () => {
    const point = IndexedField.create({ text: 'Soil' }, { id: 'a1' });
    expect(snapshotDataPoint(point)).toEqual({ text: 'Soil', id: 'a1', type: 'IndexedField' });
    expect(point.embeddableText).toBe('Soil');
  });
});
