import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as S from './schema';
import { ConstructionError, ConstructionErrorKind } from './errors';
import { TreeBuilder } from './builder';

function num(offset: number, value: number): S.Num {
    return new S.Num({offset, value});
}

function field(offset: number, name: string, visibility: S.Visibility,
               rhs: S.Expr): S.Field
{
    return new S.Field({
        offset,
        fieldName: new S.Fixed({value: name}),
        plus: false,
        params: null,
        visibility,
        rhs,
    });
}

function range(n: number): number[] {
    return Array.from({length: n}, (_, i) => i);
}

describe('Params', () => {
    it('should derive consistent indices for every size', () => {
        for (let n = 0; n <= 8; n++) {
            const params = S.Params.fromDeclarations(range(n).map(i => ({
                name: `p${i}`,
                defaultExpr: i % 2 === 1 ? num(i, i) : null,
            })));
            expect(params.size).to.equal(n);
            expect(Array.from(params.allSlots).sort((a, b) => a - b)).to.deep.equal(range(n));

            const required = Array.from(params.requiredSlots);
            const defaulted = params.defaultedSlots.map(([slot]) => slot);
            expect([...required, ...defaulted].sort((a, b) => a - b)).to.deep.equal(range(n));
            expect(required.filter(s => defaulted.includes(s))).to.deep.equal([]);

            expect(params.nameToSlot.size).to.equal(n);
            const slots = Array.from(params.nameToSlot.values()).sort((a, b) => a - b);
            expect(slots).to.deep.equal(range(n));
        }
    });

    it('should start slots at the given first slot', () => {
        const params = S.Params.fromDeclarations([{name: 'a'}, {name: 'b'}], 4);
        expect(params.slotOf('a')).to.equal(4);
        expect(params.slotOf('b')).to.equal(5);
        expect(params.slotOf('c')).to.equal(undefined);
    });

    it('should reject a repeated name', () => {
        expect(() => S.Params.fromDeclarations([{name: 'x'}, {name: 'x'}]))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.DuplicateParameterName);
    });

    it('should reject a repeated slot', () => {
        const entries = [
            new S.Param({name: 'a', defaultExpr: null, slot: 3}),
            new S.Param({name: 'b', defaultExpr: null, slot: 3}),
        ];
        expect(() => new S.Params({entries}))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.DuplicateParameterSlot);
    });

    it('should reject a negative slot', () => {
        const entries = [new S.Param({name: 'a', defaultExpr: null, slot: -1})];
        expect(() => new S.Params({entries}))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.InvalidSlot);
    });

    it('should not be changed by edits to the entry array it was built from', () => {
        const entries = [new S.Param({name: 'a', defaultExpr: null, slot: 0})];
        const params = new S.Params({entries});
        entries.push(new S.Param({name: 'b', defaultExpr: null, slot: 1}));
        expect(params.size).to.equal(1);
        expect(Object.isFrozen(params.entries)).to.equal(true);
    });

    it('should keep its indices fixed', () => {
        const params = S.Params.fromDeclarations([
            {name: 'a', defaultExpr: null},
            {name: 'b', defaultExpr: num(0, 1)},
        ], 4);
        expect(params.nameToSlot instanceof Map).to.equal(false);
        expect(params.requiredSlots instanceof Set).to.equal(false);
        expect(Reflect.get(params.nameToSlot, 'set')).to.equal(undefined);
        expect(Reflect.get(params.requiredSlots, 'add')).to.equal(undefined);
        expect(Reflect.get(params.allSlots, 'delete')).to.equal(undefined);
        expect(Reflect.set(params.nameToSlot, 'map', new Map())).to.equal(false);
        expect(() => Reflect.apply(Map.prototype.set, params.nameToSlot, ['c', 9])).to.throw(TypeError);
        expect(() => Reflect.apply(Set.prototype.clear, params.requiredSlots, [])).to.throw(TypeError);

        expect(params.nameToSlot.size).to.equal(2);
        expect(params.nameToSlot.get('c')).to.equal(undefined);
        expect(Array.from(params.nameToSlot)).to.deep.equal([['a', 4], ['b', 5]]);
        expect(Array.from(params.requiredSlots)).to.deep.equal([4]);
        expect(Array.from(params.allSlots)).to.deep.equal([4, 5]);
        expect(params.slotOf('b')).to.equal(5);
    });
});

describe('Slots', () => {
    it('should reject identifiers with slots that are not non-negative integers', () => {
        expect(() => new S.Id({offset: 3, slot: -1}))
            .to.throw(ConstructionError)
            .with.property('offset', 3);
        expect(() => new S.ForSpec({offset: 0, slot: 1.5, iterable: num(1, 1)}))
            .to.throw(ConstructionError)
            .with.property('kind', ConstructionErrorKind.InvalidSlot);
    });
});

describe('MemberList', () => {
    it('should list visible names in declaration order', () => {
        const list = new S.MemberList({members: [
            field(1, 'c', S.Visibility.Unhide, num(4, 1)),
            field(7, 'a', S.Visibility.Hidden, num(10, 2)),
            field(13, 'b', S.Visibility.Normal, num(16, 3)),
            field(19, 'd', S.Visibility.Hidden, num(22, 4)),
        ]});
        expect(list.fieldNames()).to.deep.equal(['c', 'a', 'b', 'd']);
        expect(list.visibleFieldNames()).to.deep.equal(['c', 'b']);
    });

    it('should reject two fields with the same fixed name', () => {
        const members = [
            field(1, 'a', S.Visibility.Normal, num(4, 1)),
            field(7, 'a', S.Visibility.Hidden, num(11, 2)),
        ];
        let error: unknown = null;
        try {
            new S.MemberList({members});
        } catch (e) {
            error = e;
        }
        expect(error).to.be.instanceOf(ConstructionError);
        expect(error).to.include({
            kind: ConstructionErrorKind.DuplicateStaticFieldName,
            offset: 7,
        });
    });

    it('should accept computed names that may collide', () => {
        const dyn = (offset: number) => new S.Field({
            offset,
            fieldName: new S.Dyn({expr: new S.Str({offset: offset + 1, value: 'a'})}),
            plus: false,
            params: null,
            visibility: S.Visibility.Normal,
            rhs: num(offset + 6, 1),
        });
        const list = new S.MemberList({members: [dyn(1), dyn(10)]});
        expect(list.fields.length).to.equal(2);
        expect(list.fieldNames()).to.deep.equal([]);
    });

    it('should split members by kind', () => {
        const bind = new S.BindStmt({value: new S.Bind({
            offset: 7, slot: 0, params: null, rhs: num(11, 1),
        })});
        const assertion = new S.AssertStmt({
            condition: new S.True({offset: 21}),
            message: null,
        });
        const list = new S.MemberList({members: [
            field(1, 'a', S.Visibility.Normal, num(4, 1)),
            bind,
            assertion,
        ]});
        expect(list.fields.map(f => f.offset)).to.deep.equal([1]);
        expect(list.binds).to.deep.equal([bind]);
        expect(list.asserts).to.deep.equal([assertion]);
    });
});

describe('Visibility', () => {
    it('should hide only Hidden fields', () => {
        expect(S.VISIBILITIES.filter(S.isVisible))
            .to.deep.equal([S.Visibility.Normal, S.Visibility.Unhide]);
    });

    it('should merge across inheritance', () => {
        const {Normal, Hidden, Unhide} = S.Visibility;
        expect(S.mergeVisibility(null, Normal)).to.equal(Normal);
        expect(S.mergeVisibility(null, Hidden)).to.equal(Hidden);
        expect(S.mergeVisibility(null, Unhide)).to.equal(Normal);
        expect(S.mergeVisibility(Hidden, null)).to.equal(Hidden);
        expect(S.mergeVisibility(Hidden, Normal)).to.equal(Hidden);
        expect(S.mergeVisibility(Hidden, Unhide)).to.equal(Normal);
        expect(S.mergeVisibility(Normal, Hidden)).to.equal(Hidden);
        expect(S.mergeVisibility(Unhide, Normal)).to.equal(Normal);
        expect(() => S.mergeVisibility(null, null)).to.throw(Error);
    });
});

describe('Nodes', () => {
    it('should be frozen', () => {
        const arr = new S.Arr({offset: 0, elements: [num(1, 1)]});
        expect(Object.isFrozen(arr)).to.equal(true);
        expect(Object.isFrozen(arr.elements)).to.equal(true);
    });

    it('should tell method fields and function bindings apart', () => {
        const params = S.Params.fromDeclarations([{name: 'x'}]);
        const bind = new S.Bind({offset: 0, slot: 1, params, rhs: num(5, 1)});
        expect(bind.isFunction()).to.equal(true);
        expect(field(0, 'f', S.Visibility.Normal, num(3, 1)).isMethod()).to.equal(false);
    });

    it('should separate positional and named arguments', () => {
        const args = new S.Args({entries: [
            new S.Arg({name: null, value: num(2, 1)}),
            new S.Arg({name: 'y', value: num(7, 2)}),
            new S.Arg({name: null, value: num(10, 3)}),
        ]});
        expect(args.positional.map(e => e.kind === 'Num' ? e.value : null))
            .to.deep.equal([1, 3]);
        expect(args.named.map(a => a.name)).to.deep.equal(['y']);
    });

    it('should classify expressions and comprehension specs', () => {
        const spec = new S.IfSpec({offset: 0, cond: new S.True({offset: 3})});
        expect(S.isExpr(num(0, 1))).to.equal(true);
        expect(S.isExpr(new S.Fixed({value: 'a'}))).to.equal(false);
        expect(S.isCompSpec(spec)).to.equal(true);
        expect(S.isCompSpec(num(0, 1))).to.equal(false);
    });
});

describe('Scenarios', () => {
    it('should build an object literal with a hidden field', () => {
        // {a: 1, b:: 2}
        const b = new TreeBuilder();
        const obj = b.obj(0, [
            {kind: 'field', offset: 1, name: 'a', rhs: () => b.num(4, 1)},
            {kind: 'field', offset: 7, name: 'b', visibility: S.Visibility.Hidden,
             rhs: () => b.num(11, 2)},
        ]);
        expect(obj.body.kind).to.equal('MemberList');
        if (obj.body.kind !== 'MemberList') {
            return;
        }
        const [a, hidden] = obj.body.fields;
        expect(a.fieldName).to.deep.equal(new S.Fixed({value: 'a'}));
        expect(a.plus).to.equal(false);
        expect(a.params).to.equal(null);
        expect(a.visibility).to.equal(S.Visibility.Normal);
        expect(a.rhs).to.deep.equal(num(4, 1));
        expect(hidden.fieldName).to.deep.equal(new S.Fixed({value: 'b'}));
        expect(hidden.visibility).to.equal(S.Visibility.Hidden);
        expect(hidden.rhs).to.deep.equal(num(11, 2));
        expect(obj.body.visibleFieldNames()).to.deep.equal(['a']);
    });

    it('should build a function with a defaulted parameter', () => {
        // function(a, b=2) a+b
        const b = new TreeBuilder();
        const fn = b.func(0, [
            {name: 'a'},
            {name: 'b', defaultExpr: () => b.num(14, 2)},
        ], () => b.binary(17, b.id(17, 'a'), S.BinaryOperator.Add, b.id(19, 'b')));

        expect(fn.params.entries.map(p => [p.name, p.defaultExpr, p.slot]))
            .to.deep.equal([['a', null, 0], ['b', num(14, 2), 1]]);
        expect(Array.from(fn.params.requiredSlots)).to.deep.equal([0]);
        expect(fn.params.defaultedSlots).to.deep.equal([[1, num(14, 2)]]);
        expect(fn.body).to.deep.equal(new S.BinaryOp({
            offset: 17,
            lhs: new S.Id({offset: 17, slot: 0}),
            op: S.BinaryOperator.Add,
            rhs: new S.Id({offset: 19, slot: 1}),
        }));
    });
});
