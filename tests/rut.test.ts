import { describe, it, expect } from 'vitest';
import {
  Rut,
  formatearRUT,
  fromNumber,
  limpiarRUT,
  parse,
  randomize,
  validarRUT,
} from '../src/rut.js';
import { Format } from '../src/format.js';
import { computeCheckDigit } from '../src/checksum.js';
import { isInRange } from '../src/range.js';

function unwrap(result: ReturnType<typeof parse>): Rut {
  if (!result.ok) throw result.error;
  return result.value;
}

describe('parse', () => {
  it('valida RUTs correctos', () => {
    for (const input of ['17951585-7', '5.665.328-7', '241367738', '17608393-k', '11.111.111-1']) {
      expect(parse(input).ok).toBe(true);
    }
  });

  it('retorna número y DV verificados', () => {
    const rut = unwrap(parse('17.608.393-k'));

    expect(rut.number).toBe(17608393);
    expect(rut.dv).toBe('K');
  });

  it('rechaza DV incorrecto indicando el esperado', () => {
    const result = parse('17951585-K');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.detail).toEqual({ code: 'INVALID_DV', expected: '7', actual: 'K' });
      expect(result.error.message).toBe('DV inválido, debe ser 7, en cambio K.');
    }
  });

  it('rechaza formato inválido', () => {
    const result = parse('17.951,585-7');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_FORMAT');
  });

  it('rechaza cuerpos bien formados fuera de rango', () => {
    for (const input of ['0.000.000-0', '0999999-9', '99.999.999-9']) {
      const result = parse(input);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('OUT_OF_RANGE');
    }
  });

  it('Rut.fromText es equivalente a parse', () => {
    expect(unwrap(Rut.fromText('24136773-8')).equals(unwrap(parse('241367738')))).toBe(true);
  });
});

describe('fromNumber', () => {
  it('calcula el DV', () => {
    const cases: Array<[number, string]> = [
      [17951585, '7'],
      [12621806, '0'],
      [24136773, '8'],
    ];

    for (const [number, dv] of cases) {
      const rut = unwrap(fromNumber(number));
      expect(rut.number).toBe(number);
      expect(rut.dv).toBe(dv);
    }
  });

  it('acepta los extremos del rango', () => {
    expect(unwrap(fromNumber(1_000_000)).toString()).toBe('1000000-9');
    expect(unwrap(fromNumber(99_999_998)).toString()).toBe('99999998-0');
  });

  it('rechaza números fuera de rango', () => {
    for (const number of [999_999, 99_999_999, 100_000_000, -1, 17951585.5]) {
      const result = fromNumber(number);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('OUT_OF_RANGE');
        expect(result.error.message).toBe('El número debe estar entre 1.000.000 y 99.999.999');
      }
    }
  });
});

describe('randomize', () => {
  it('genera RUTs válidos dentro del rango', () => {
    for (let i = 0; i < 50; i++) {
      const rut = randomize();
      expect(isInRange(rut.number)).toBe(true);
      expect(rut.dv).toBe(computeCheckDigit(rut.number));
    }
  });

  it('usa la fuente aleatoria inyectada', () => {
    const rut = randomize(() => 17608393);

    expect(rut.toString()).toBe('17608393-K');
  });
});

describe('Rut.render', () => {
  const rut = unwrap(fromNumber(5665328));

  it('formatea con puntos y guión', () => {
    expect(rut.render(Format.DOTS)).toBe('5.665.328-7');
  });

  it('formatea con guión', () => {
    expect(rut.render(Format.DASH)).toBe('5665328-7');
  });

  it('formatea sin separadores', () => {
    expect(rut.render(Format.NONE)).toBe('56653287');
  });

  it('usa guión al convertir a string y JSON', () => {
    expect(String(rut)).toBe('5665328-7');
    expect(JSON.stringify({ rut })).toBe('{"rut":"5665328-7"}');
  });

  it('ocho dígitos con puntos', () => {
    expect(unwrap(fromNumber(17951585)).render(Format.DOTS)).toBe('17.951.585-7');
  });
});

describe('round trip', () => {
  it('parse(render(DASH)) reconstruye el mismo RUT', () => {
    for (let i = 0; i < 20; i++) {
      const rut = randomize();
      expect(unwrap(parse(rut.render(Format.DASH))).equals(rut)).toBe(true);
    }
  });

  it('formatear, parsear y formatear produce el mismo string', () => {
    for (const format of [Format.DOTS, Format.DASH, Format.NONE]) {
      const first = unwrap(fromNumber(17608393)).render(format);
      expect(unwrap(parse(first)).render(format)).toBe(first);
    }
  });
});

describe('Rut', () => {
  it('es inmutable', () => {
    const rut = unwrap(fromNumber(17951585));
    expect(Object.isFrozen(rut)).toBe(true);
  });

  it('compara por número y DV', () => {
    const a = unwrap(parse('17951585-7'));
    const b = unwrap(parse('17.951.585-7'));
    const c = unwrap(parse('24136773-8'));

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });
});

describe('validarRUT', () => {
  it('valida RUTs correctos con y sin formato', () => {
    expect(validarRUT('11111111-1')).toBe(true);
    expect(validarRUT('12.345.678-5')).toBe(true);
    expect(validarRUT('17608393-k')).toBe(true);
  });

  it('ignora espacios', () => {
    expect(validarRUT(' 11.111.111-1 ')).toBe(true);
    expect(validarRUT('11 111 111-1')).toBe(true);
  });

  it('rechaza DV incorrecto y formato inválido', () => {
    expect(validarRUT('12345678-0')).toBe(false);
    expect(validarRUT('')).toBe(false);
    expect(validarRUT('1234567890')).toBe(false);
    expect(validarRUT('abcdefgh-i')).toBe(false);
  });
});

describe('formatearRUT', () => {
  it('formatea con puntos por defecto', () => {
    expect(formatearRUT('111111111')).toBe('11.111.111-1');
    expect(formatearRUT('12345678-5')).toBe('12.345.678-5');
    expect(formatearRUT('7654321-6')).toBe('7.654.321-6');
  });

  it('acepta un formato de salida', () => {
    expect(formatearRUT('12.345.678-5', Format.NONE)).toBe('123456785');
    expect(formatearRUT('17608393k', Format.DASH)).toBe('17608393-K');
  });

  it('retorna null para RUTs inválidos', () => {
    expect(formatearRUT('12345678-0')).toBeNull();
    expect(formatearRUT('1')).toBeNull();
  });
});

describe('limpiarRUT', () => {
  it('remueve puntos y guiones', () => {
    expect(limpiarRUT('11.111.111-1')).toBe('111111111');
    expect(limpiarRUT('7.654.321-K')).toBe('7654321K');
  });

  it('convierte K a mayúscula', () => {
    expect(limpiarRUT('7654321-k')).toBe('7654321K');
  });
});
