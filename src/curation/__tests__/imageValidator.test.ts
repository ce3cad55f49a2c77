/**
 * Unit tests for news image URL heuristics
 */

import { isValidNewsImage } from '../imageValidator';

describe('isValidNewsImage', () => {
  it('should accept a CDN-hosted photo', () => {
    expect(isValidNewsImage('https://cdn.example.com/img/photo.jpg')).toBe(true);
  });

  it('should reject ad, social and placeholder URLs', () => {
    expect(isValidNewsImage('https://static.doubleclick.net/banner.jpg')).toBe(false);
    expect(isValidNewsImage('https://www.facebook.com/photos/cover.jpg')).toBe(false);
    expect(isValidNewsImage('https://news.example.com/spacer.gif')).toBe(false);
  });

  it('should reject URLs naming site chrome', () => {
    expect(isValidNewsImage('https://cdn.example.com/site-logo.png')).toBe(false);
    expect(isValidNewsImage('https://cdn.example.com/img/share-button.png')).toBe(false);
    expect(isValidNewsImage('https://cdn.example.com/u/avatar-42.jpg')).toBe(false);
  });

  it('should reject absent URLs', () => {
    expect(isValidNewsImage(undefined)).toBe(false);
    expect(isValidNewsImage(null)).toBe(false);
    expect(isValidNewsImage('')).toBe(false);
    expect(isValidNewsImage('   ')).toBe(false);
  });

  it('should accept extensionless URLs only on image hosting paths', () => {
    expect(isValidNewsImage('https://news.example.com/images/hero')).toBe(true);
    expect(isValidNewsImage('https://news.example.com/photo?id=7')).toBe(false);
  });

  it('should match case-insensitively', () => {
    expect(isValidNewsImage('https://cdn.example.com/PHOTO.JPG')).toBe(true);
    expect(isValidNewsImage('https://cdn.example.com/Brand-LOGO.jpg')).toBe(false);
  });
});
