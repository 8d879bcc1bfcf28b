import Graph from '../../src/architecture/graph';
import {
  CycleDetectedError,
  DuplicateNameError,
  GraphErrorCode,
  InvalidArgumentError,
  UnknownNodeError,
  UnsupportedOperationError,
} from '../../src/utils/errors';
import { config } from '../../src/config';

describe('Graph', () => {
  describe('construction', () => {
    it('registers nodes under sequential handles', () => {
      // Arrange
      const graph = new Graph();
      // Act
      const handles = [
        graph.createInput('x').index,
        graph.createConstant('bias', 1).index,
        graph.createSum('s').index,
        graph.createSigmoid('y').index,
      ];
      // Assert
      expect(handles).toEqual([0, 1, 2, 3]);
    });

    it('throws DuplicateNameError for a repeated id', () => {
      // Arrange
      const graph = new Graph();
      graph.createSum('h');
      // Act
      const act = () => graph.createSigmoid('h');
      // Assert
      expect(act).toThrow(DuplicateNameError);
    });

    it('does not register the rejected duplicate', () => {
      // Arrange
      const graph = new Graph();
      graph.createSum('h');
      // Act
      expect(() => graph.createSigmoid('h')).toThrow();
      // Assert
      expect(graph.size).toBe(1);
    });

    it('rejects an empty id', () => {
      // Arrange
      const graph = new Graph();
      // Act
      const act = () => graph.createInput('');
      // Assert
      expect(act).toThrow(InvalidArgumentError);
    });

    it('falls back to the configured learning rate', () => {
      // Act
      const graph = new Graph();
      // Assert
      expect(graph.learningRate).toBe(config.defaultLearningRate);
    });

    it('takes the learning rate from options', () => {
      // Act
      const graph = new Graph({ learningRate: 0.25 });
      // Assert
      expect(graph.learningRate).toBe(0.25);
    });
  });

  describe('lookup', () => {
    let graph: Graph;

    beforeEach(() => {
      // Arrange
      graph = new Graph();
      graph.createInput('x', 1);
      graph.createSum('s');
    });

    it('resolves a node by id', () => {
      // Act
      const node = graph.lookup('s');
      // Assert
      expect(node.index).toBe(1);
    });

    it('resolves a node by handle', () => {
      // Act
      const node = graph.node(0);
      // Assert
      expect(node.id).toBe('x');
    });

    it('throws UnknownNodeError for a missing id', () => {
      // Act
      const act = () => graph.lookup('missing');
      // Assert
      expect(act).toThrow(UnknownNodeError);
    });

    it('throws UnknownNodeError for a missing handle', () => {
      // Act
      const act = () => graph.node(9);
      // Assert
      expect(act).toThrow(UnknownNodeError);
    });

    it('reports membership with has()', () => {
      // Assert
      expect([graph.has('x'), graph.has('y')]).toEqual([true, false]);
    });
  });

  describe('node sets', () => {
    let graph: Graph;

    beforeEach(() => {
      // Arrange
      graph = new Graph();
      const x = graph.createInput('x', 1);
      const bias = graph.createConstant('bias', 1);
      const h = graph.createSigmoid('h');
      const y = graph.createSum('y');
      graph.connect(x, h, 1);
      graph.connect(bias, h, 1);
      graph.connect(h, y, 1);
    });

    it('lists input nodes', () => {
      // Act
      const ids = graph.inputNodes().map((node) => node.id);
      // Assert
      expect(ids).toEqual(['x']);
    });

    it('lists input and constant nodes as sources', () => {
      // Act
      const ids = graph.sources().map((node) => node.id);
      // Assert
      expect(ids).toEqual(['x', 'bias']);
    });

    it('lists weighted nodes without consumers as terminals', () => {
      // Act
      const ids = graph.terminals().map((node) => node.id);
      // Assert
      expect(ids).toEqual(['y']);
    });
  });

  describe('connect()', () => {
    describe('Scenario: legal wiring', () => {
      it('stores the edge on the consumer', () => {
        // Arrange
        const graph = new Graph();
        const x = graph.createInput('x', 1);
        const s = graph.createSum('s');
        // Act
        graph.connect(x, s, 0.3);
        // Assert
        expect(s.inputs.get('x')?.weight).toBe(0.3);
      });

      it('records the back-link on the producer', () => {
        // Arrange
        const graph = new Graph();
        const x = graph.createInput('x', 1);
        const s = graph.createSum('s');
        // Act
        graph.connect(x, s, 0.3);
        // Assert
        expect(x.outputs).toEqual([s.index]);
      });

      it('overwrites the weight without duplicating the back-link on re-wire', () => {
        // Arrange
        const graph = new Graph();
        const x = graph.createInput('x', 1);
        const s = graph.createSum('s');
        graph.connect(x, s, 0.3);
        // Act
        const connection = graph.connect(x, s, 0.9);
        // Assert
        expect([connection.weight, x.outputs.length, s.inputs.size]).toEqual([0.9, 1, 1]);
      });

      it('accepts a constant as producer', () => {
        // Arrange
        const graph = new Graph();
        const bias = graph.createConstant('bias', 1);
        const s = graph.createSigmoid('s');
        // Act
        graph.connect(bias, s, -2);
        // Assert
        expect(s.inputs.get('bias')?.weight).toBe(-2);
      });
    });

    describe('Scenario: weight omitted', () => {
      it('draws the weight from the injected generator', () => {
        // Arrange
        const graph = new Graph({ rng: () => 0.75 });
        const x = graph.createInput('x', 1);
        const s = graph.createSum('s');
        // Act
        const connection = graph.connect(x, s);
        // Assert
        expect(connection.weight).toBe(0.5);
      });

      it('draws weights inside the configured range', () => {
        // Arrange
        const graph = new Graph({ seed: 'range-check' });
        const x = graph.createInput('x', 1);
        const sums = Array.from({ length: 20 }, (_, i) => graph.createSum(`s${i}`));
        // Act
        const weights = sums.map((s) => graph.connect(x, s).weight);
        // Assert
        expect(weights.every((w) => w >= -1 && w < 1)).toBe(true);
      });

      it('repeats the same weights for the same seed', () => {
        // Arrange
        const build = () => {
          const graph = new Graph({ seed: 'repeatable' });
          const x = graph.createInput('x', 1);
          const a = graph.createSum('a');
          const b = graph.createSum('b');
          return [graph.connect(x, a).weight, graph.connect(x, b).weight];
        };
        // Act
        const first = build();
        const second = build();
        // Assert
        expect(first).toEqual(second);
      });
    });

    describe('Scenario: consumer is a source node', () => {
      it('throws UnsupportedOperationError when wiring into an input', () => {
        // Arrange
        const graph = new Graph();
        const s = graph.createSum('s');
        const x = graph.createInput('x', 1);
        // Act
        const act = () => graph.connect(s, x, 1);
        // Assert
        expect(act).toThrow(UnsupportedOperationError);
      });

      it('leaves both nodes unmodified', () => {
        // Arrange
        const graph = new Graph();
        const s = graph.createSum('s');
        const x = graph.createInput('x', 1);
        // Act
        expect(() => graph.connect(s, x, 1)).toThrow();
        // Assert
        expect([s.outputs.length, x.inputs.size]).toEqual([0, 0]);
      });

      it('throws UnsupportedOperationError when wiring into a constant', () => {
        // Arrange
        const graph = new Graph();
        const x = graph.createInput('x', 1);
        const bias = graph.createConstant('bias', 1);
        // Act
        const act = () => graph.connect(x, bias, 1);
        // Assert
        expect(act).toThrow(UnsupportedOperationError);
      });
    });

    describe('Scenario: edge would close a cycle', () => {
      it('rejects a two-node loop with the loop path', () => {
        // Arrange
        const graph = new Graph();
        const a = graph.createSum('a');
        const b = graph.createSum('b');
        graph.connect(a, b, 1);
        // Act
        const act = () => graph.connect(b, a, 1);
        // Assert
        expect(act).toThrow("Cycle detected at 'b': b -> a -> b");
      });

      it('leaves the graph unmodified', () => {
        // Arrange
        const graph = new Graph();
        const a = graph.createSum('a');
        const b = graph.createSum('b');
        graph.connect(a, b, 1);
        // Act
        expect(() => graph.connect(b, a, 1)).toThrow(CycleDetectedError);
        // Assert
        expect([b.outputs.length, a.inputs.size]).toEqual([0, 0]);
      });

      it('rejects a self-loop', () => {
        // Arrange
        const graph = new Graph();
        const s = graph.createSum('s');
        // Act
        const act = () => graph.connect(s, s, 1);
        // Assert
        expect(act).toThrow("Cycle detected at 's': s -> s");
      });

      it('allows the loop when acyclicity is not enforced', () => {
        // Arrange
        const graph = new Graph({ enforceAcyclic: false });
        const a = graph.createSum('a');
        const b = graph.createSum('b');
        graph.connect(a, b, 1);
        // Act
        graph.connect(b, a, 1);
        // Assert
        expect(a.inputs.has('b')).toBe(true);
      });
    });

    it('rejects a non-finite weight', () => {
      // Arrange
      const graph = new Graph();
      const x = graph.createInput('x', 1);
      const s = graph.createSum('s');
      // Act
      const act = () => graph.connect(x, s, Number.NaN);
      // Assert
      expect(act).toThrow(InvalidArgumentError);
    });

    it('rejects a node owned by another graph', () => {
      // Arrange
      const graph = new Graph();
      const other = new Graph();
      graph.createInput('x', 1);
      const s = graph.createSum('s');
      const foreign = other.createInput('x', 1);
      // Act
      const act = () => graph.connect(foreign, s, 1);
      // Assert
      expect(act).toThrow(UnknownNodeError);
    });
  });

  describe('nextIteration()', () => {
    it('hands out increasing tokens starting at 0', () => {
      // Arrange
      const graph = new Graph();
      // Act
      const tokens = [graph.nextIteration(), graph.nextIteration(), graph.nextIteration()];
      // Assert
      expect(tokens).toEqual([0, 1, 2]);
    });

    it('exposes the last token handed out', () => {
      // Arrange
      const graph = new Graph();
      graph.nextIteration();
      // Act
      const current = graph.currentIteration;
      // Assert
      expect(current).toBe(0);
    });
  });

  describe('clear()', () => {
    it('resets activations and training state but keeps weights', () => {
      // Arrange
      const graph = new Graph();
      const x = graph.createInput('x', 2);
      const s = graph.createSum('s');
      graph.connect(x, s, 3);
      graph.evaluate([s]);
      graph.propagateAll({ iteration: graph.nextIteration(), lossDerivative: { s: 1 } });
      // Act
      graph.clear();
      // Assert
      expect([s.lastActivation(), s.trainingState.dloss, s.inputs.get('x')?.weight]).toEqual([
        0, 0, 3,
      ]);
    });
  });

  describe('toJSON()', () => {
    it('serializes the learning rate and every node', () => {
      // Arrange
      const graph = new Graph({ learningRate: 0.5 });
      const x = graph.createInput('x', 1);
      const s = graph.createSum('s');
      graph.connect(x, s, 2);
      // Act
      const json = graph.toJSON();
      // Assert
      expect(json).toEqual({
        learningRate: 0.5,
        nodes: [
          { id: 'x', kind: 'input', index: 0, value: 1 },
          { id: 's', kind: 'sum', index: 1, inputs: [{ from: 0, to: 1, weight: 2 }] },
        ],
      });
    });
  });

  it('tags errors with their code', () => {
    // Arrange
    const graph = new Graph();
    graph.createSum('h');
    // Act
    let code: GraphErrorCode | undefined;
    try {
      graph.createSum('h');
    } catch (err) {
      if (err instanceof DuplicateNameError) code = err.code;
    }
    // Assert
    expect(code).toBe(GraphErrorCode.DUPLICATE_NAME);
  });
});
