import { describeScanResult } from './associations';
import { scanDocstrings, scanMarkers, scanProximity, scanPythonSource } from './python';

const pressureTests = `import pytest


@pytest.mark.requirement("REQ-001")
def test_boundary_high_pressure():
    assert True


@pytest.mark.parametrize(
    "value",
    [1, 2],
)
@pytest.mark.requirements(
    "REQ-002",
    "REQ-006",
)
def test_boundary_low_pressure(value):
    """Covers REQ-007 low pressure."""
    assert value < 3


def test_req_004_calibration():
    # see REQ-008
    pass


class TestValves:
    @mark.requirement("REQ-009")
    async def test_valve_opens(self):
        '''Valve opens.'''
        pass
`;

describe('scanPythonSource', () => {
  it('unions all heuristics, keeping the most confident one', () => {
    expect(describeScanResult(scanPythonSource(pressureTests))).toEqual({
      test_boundary_high_pressure: { 'REQ-001': 'metadata' },
      test_boundary_low_pressure: { 'REQ-002': 'metadata', 'REQ-006': 'metadata', 'REQ-007': 'docstring' },
      test_req_004_calibration: { 'REQ-004': 'name', 'REQ-008': 'proximity' },
      test_valve_opens: { 'REQ-009': 'metadata' },
    });
  });

  it('reads markers only from the decorator block above the definition', () => {
    const source = `@pytest.mark.requirement("REQ-001")
x = 1
def test_unmarked():
    pass

@pytest.mark.requirement("REQ-002")
# comment between
def test_marked():
    pass
`;
    expect(describeScanResult(scanMarkers(source, 'REQ'))).toEqual({
      test_marked: { 'REQ-002': 'metadata' },
    });
  });

  it('reads raw docstrings in either quote style', () => {
    const source = `def test_single() -> None:

    r'''Checks REQ-011.'''


def test_not_first():
    value = 1
    """REQ-012"""
`;
    expect(describeScanResult(scanDocstrings(source, 'REQ'))).toEqual({
      test_single: { 'REQ-011': 'docstring' },
    });
  });
});

describe('scanProximity', () => {
  it('assigns identifiers to the most recent test and ignores text before the first one', () => {
    const source = `# REQ-001 module header
def test_first():
    assert check("REQ-002")

@pytest.mark.requirement("REQ-003")
def test_second():
    pass
# trailing note on REQ-004
`;
    expect(describeScanResult(scanProximity(source, 'REQ'))).toEqual({
      test_first: { 'REQ-002': 'proximity' },
      test_second: { 'REQ-004': 'proximity' },
    });
  });
});
