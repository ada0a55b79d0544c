/**
 * CoT 인코더 테스트
 */

import {
  baseId,
  buildRemarks,
  colorFor,
  CotEncoder,
  cotTypeFor,
  formatCotTime,
} from '../core/cot/cotEncoder';
import { escapeAttr, escapeText } from '../core/cot/xml';
import { createTestRecord } from './helpers';

describe('CotEncoder', () => {
  const now = new Date('2026-01-02T03:04:05.678Z');
  const encoder = new CotEncoder({ clock: () => now });

  it('본체 이벤트의 헤더와 위치를 생성해야 함', () => {
    const xml = encoder.encodeMain(createTestRecord(), 30).toString('utf-8');
    const lines = xml.split('\n');

    expect(lines[0]).toBe("<?xml version='1.0' encoding='UTF-8'?>");
    expect(lines[1]).toBe(
      '<event version="2.0" uid="drone-X" type="a-u-A-M-H-R" time="2026-01-02T03:04:05.678000Z" ' +
        'start="2026-01-02T03:04:05.678000Z" stale="2026-01-02T03:04:35.678000Z" how="m-g">'
    );
    expect(lines[2]).toBe('  <point lat="40" lon="-70" hae="100" ce="35.0" le="999999"/>');
    expect(xml).toContain('    <contact callsign="drone-X"/>');
    expect(xml).toContain('    <precisionlocation geopointsrc="gps" altsrc="gps"/>');
    expect(xml).toContain('    <track course="270" speed="5.5"/>');
    expect(xml).toContain('    <color argb="-256"/>');
    expect(xml.endsWith('</event>\n')).toBe(true);
  });

  it('staleOffset이 없으면 10분 뒤를 stale로 사용해야 함', () => {
    const xml = encoder.encodeMain(createTestRecord()).toString('utf-8');
    expect(xml).toContain('stale="2026-01-02T03:14:05.678000Z"');
  });

  it('방위/속도가 없으면 track 값은 0이어야 함', () => {
    const xml = encoder.encodeMain(createTestRecord({ direction: null, speed: 0 })).toString('utf-8');
    expect(xml).toContain('<track course="0" speed="0"/>');
  });

  it('요약 문자열의 특수 문자를 이스케이프해야 함', () => {
    const xml = encoder.encodeMain(createTestRecord({ mac: 'a&b<c>' })).toString('utf-8');
    expect(xml).toContain('<remarks>MAC: a&amp;b&lt;c&gt;, RSSI: -60dBm;');
  });

  it('조종자 이벤트는 pilot- 접두어 UID와 사람 아이콘을 사용해야 함', () => {
    const record = createTestRecord({ pilotLat: 40.1, pilotLon: -70.1, affiliation: 'authorized' });
    const xml = encoder.encodePilot(record, 30).toString('utf-8');

    expect(xml).toContain('uid="pilot-X" type="b-m-p-s-m"');
    expect(xml).toContain('<point lat="40.1" lon="-70.1" hae="100" ce="35.0" le="999999"/>');
    expect(xml).toContain('<contact callsign="pilot-X"/>');
    expect(xml).toContain('<usericon iconsetpath="com.atakmap.android.maps.public/Civilian/Person.png"/>');
    expect(xml).toContain('<remarks>Pilot location for drone drone-X</remarks>');
    expect(xml).toContain('<color argb="-16776961"/>');
  });

  it('이륙 지점 이벤트는 home- 접두어 UID와 집 아이콘을 사용해야 함', () => {
    const record = createTestRecord({ homeLat: 40.2, homeLon: -70.2, affiliation: 'unauthorized' });
    const xml = encoder.encodeHome(record).toString('utf-8');

    expect(xml).toContain('uid="home-X" type="b-m-p-s-m"');
    expect(xml).toContain('<usericon iconsetpath="com.atakmap.android.maps.public/Civilian/House.png"/>');
    expect(xml).toContain('<remarks>Home location for drone drone-X</remarks>');
    expect(xml).toContain('<color argb="-65536"/>');
  });
});

describe('CoT 보조 함수', () => {
  it('UA 타입별 CoT 타입을 선택해야 함', () => {
    expect(cotTypeFor(1)).toBe('a-f-A-f');
    expect(cotTypeFor(2)).toBe('a-u-A-M-H-R');
    expect(cotTypeFor(6)).toBe('a-f-A-f');
    expect(cotTypeFor(7)).toBe('b-m-p-s-m');
    expect(cotTypeFor(15)).toBe('b-m-p-s-m');
    expect(cotTypeFor(0)).toBe('a-u-A-M-H-R');
    expect(cotTypeFor(null)).toBe('a-u-A-M-H-R');
  });

  it('알 수 없는 소속은 회색이어야 함', () => {
    expect(colorFor('authorized')).toBe('-16776961');
    expect(colorFor('unknown')).toBe('-256');
    expect(colorFor('pending')).toBe('-8355712');
  });

  it('drone- 접두어만 제거해야 함', () => {
    expect(baseId('drone-SN1')).toBe('SN1');
    expect(baseId('SN1')).toBe('SN1');
  });

  it('시각을 마이크로초 6자리로 표시해야 함', () => {
    expect(formatCotTime(new Date('2026-05-06T07:08:09.001Z'))).toBe('2026-05-06T07:08:09.001000Z');
  });

  it('요약 문자열 형식', () => {
    expect(buildRemarks(createTestRecord())).toBe(
      'MAC: aa:bb, RSSI: -60dBm; ID Type: Serial Number (ANSI/CTA-2063-A); ' +
        'UA Type: Helicopter or Multirotor (2); Operator ID: [Operator ID: OP1]; ' +
        'Speed: 5.5 m/s; Vert Speed: 1 m/s; Altitude: 100 m; AGL: 30 m; ' +
        'Course: 270°; Index: 0; Runtime: 0s'
    );
    expect(buildRemarks(createTestRecord({ uaType: null, uaTypeName: 'Unknown', direction: null }))).toContain(
      'UA Type: Unknown (N/A);'
    );
  });

  it('XML 이스케이프', () => {
    expect(escapeText('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
    expect(escapeAttr('say "hi"\n')).toBe('say &quot;hi&quot;&#10;');
    expect(escapeText('bell\u0007')).toBe('bell');
  });
});
